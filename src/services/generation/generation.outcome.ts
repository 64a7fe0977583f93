/**
 * Worker boundary
 *
 * Turns a generation attempt into a tagged outcome. Nothing thrown by the
 * generator escapes, so every attempt reaches Complete or Fail.
 */

import { isApiError } from '../../middlewares/errorHandler';
import { ErrorCode } from '../../types/errors';
import { GenerationJobMessage, GenerationOutcome } from '../../types/domain';

import { ImageGenerator } from './image.generator';

export const describeFailure = (error: unknown): string => {
  if (isApiError(error)) {
    return `${ErrorCode[error.errorCode]}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return 'Unknown generation error';
};

export async function runGeneration(
  generator: ImageGenerator,
  message: GenerationJobMessage
): Promise<GenerationOutcome> {
  try {
    const result = await generator.generate({
      jobId: message.jobId,
      prompt: message.prompt,
      referenceImages: message.referenceImages,
      settings: message.settings,
    });
    return { kind: 'completed', result };
  } catch (error) {
    return { kind: 'failed', error: describeFailure(error) };
  }
}
