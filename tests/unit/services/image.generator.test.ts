/**
 * Image Generator Client Unit Tests
 */

jest.mock('axios', () => {
  const actual = jest.requireActual<typeof import('axios')>('axios');
  const post = jest.fn();
  return {
    ...actual,
    __esModule: true,
    default: { ...actual.default, post, create: jest.fn(() => ({ post })) },
  };
});

import axios, { AxiosError } from 'axios';

import { ApiError } from '../../../src/middlewares/errorHandler';
import { HttpImageGenerator } from '../../../src/services/generation/image.generator';
import { ErrorCode } from '../../../src/types/errors';
import { axiosResponse } from '../../helpers/axios';

const mockPost = jest.mocked(axios.post);

const request = {
  jobId: 'gen_1',
  prompt: 'a red fox',
  referenceImages: ['https://images.test/ref.png'],
  settings: { steps: 30 },
};

const options = {
  apiUrl: 'http://generator.test/generate',
  apiKey: 'test-key',
  timeoutMs: 1000,
};

describe('HttpImageGenerator', () => {
  const generator = new HttpImageGenerator(options);

  it('should post the job and return the parsed result', async () => {
    mockPost.mockResolvedValueOnce(
      axiosResponse({ imageUrl: 'https://images.test/out.png', seed: 99, extra: true })
    );

    const result = await generator.generate(request);

    expect(result).toEqual({ imageUrl: 'https://images.test/out.png', seed: 99 });
    expect(mockPost).toHaveBeenCalledWith('http://generator.test/generate', {
      prompt: 'a red fox',
      reference_images: ['https://images.test/ref.png'],
      settings: { steps: 30 },
      request_id: 'gen_1',
    });
  });

  it('should send the API key as a bearer token', () => {
    new HttpImageGenerator(options);

    expect(axios.create).toHaveBeenCalledWith({
      timeout: 1000,
      headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-key' },
    });
  });

  it('should map a timeout to UPSTREAM_TIMEOUT', async () => {
    mockPost.mockRejectedValueOnce(new AxiosError('timeout of 1000ms exceeded', 'ECONNABORTED'));

    const error = await generator.generate(request).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiError);
    expect(error instanceof ApiError && error.errorCode).toBe(ErrorCode.UPSTREAM_TIMEOUT);
    expect(error instanceof ApiError && error.message).toBe(
      'Image generation timed out after 1000ms'
    );
  });

  it('should map an HTTP error to UPSTREAM_UNAVAILABLE with the status', async () => {
    const response = axiosResponse({}, 503);
    mockPost.mockRejectedValueOnce(
      new AxiosError('Request failed', 'ERR_BAD_RESPONSE', undefined, undefined, response)
    );

    const error = await generator.generate(request).catch((e: unknown) => e);

    expect(error instanceof ApiError && error.errorCode).toBe(ErrorCode.UPSTREAM_UNAVAILABLE);
    expect(error instanceof ApiError && error.message).toBe(
      'Image generation request failed with status 503'
    );
  });

  it('should reject a response without an image URL', async () => {
    mockPost.mockResolvedValueOnce(axiosResponse({ status: 'ok' }));

    const error = await generator.generate(request).catch((e: unknown) => e);

    expect(error instanceof ApiError && error.message).toBe(
      'Image generation returned an unexpected response'
    );
  });
});
