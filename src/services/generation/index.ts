/**
 * Generation Module
 *
 * Job coordinator, its state machine and the worker boundary.
 */

export {
  JobCoordinator,
  JobCoordinatorDeps,
  CoordinatorLimits,
  CreateJobInput,
  GenerationHandle,
  defaultCoordinatorLimits,
  ENQUEUE_FAILED,
  CANCELLED,
} from './generation.service';
export {
  isValidTransition,
  validateTransition,
  isTerminalState,
  getAllowedTransitions,
} from './generation.state';
export { runGeneration, describeFailure } from './generation.outcome';
export { ImageGenerator, HttpImageGenerator, GenerationRequest } from './image.generator';
export { createGenerationRoutes } from './generation.routes';
