/**
 * Image generation API client
 *
 * Thin HTTP wrapper; all job bookkeeping lives in the coordinator.
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';

import { config } from '../../config';
import { ApiError } from '../../middlewares/errorHandler';
import { GenerationResult, GenerationSettings } from '../../types/domain';

export interface GenerationRequest {
  jobId: string;
  prompt: string;
  referenceImages: string[];
  settings: GenerationSettings;
}

export interface ImageGenerator {
  generate(request: GenerationRequest): Promise<GenerationResult>;
}

const generationResponseSchema = z.object({
  imageUrl: z.string().url(),
  seed: z.number().int().optional(),
  metadata: z.record(z.unknown()).optional(),
});

export interface HttpImageGeneratorOptions {
  apiUrl: string;
  apiKey: string;
  timeoutMs: number;
}

const isTimeout = (error: unknown): boolean =>
  axios.isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT');

export class HttpImageGenerator implements ImageGenerator {
  private readonly client: AxiosInstance;

  constructor(
    private readonly options: HttpImageGeneratorOptions = {
      apiUrl: config.generation.apiUrl,
      apiKey: config.generation.apiKey,
      timeoutMs: config.generation.timeoutMs,
    }
  ) {
    this.client = axios.create({
      timeout: options.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
        ...(options.apiKey && { Authorization: `Bearer ${options.apiKey}` }),
      },
    });
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    let body: unknown;
    try {
      const response = await this.client.post(this.options.apiUrl, {
        prompt: request.prompt,
        reference_images: request.referenceImages,
        settings: request.settings,
        request_id: request.jobId,
      });
      body = response.data;
    } catch (error) {
      if (isTimeout(error)) {
        throw ApiError.upstreamTimeout(
          `Image generation timed out after ${this.options.timeoutMs}ms`
        );
      }
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      throw ApiError.upstreamUnavailable(
        `Image generation request failed${status ? ` with status ${status}` : ''}`
      );
    }

    const parsed = generationResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw ApiError.upstreamUnavailable('Image generation returned an unexpected response');
    }
    return parsed.data;
  }
}
