/**
 * Middleware Exports
 *
 * Central export point for all middleware modules.
 */

// Error handling
export {
  errorHandler,
  notFoundHandler,
  ApiError,
  isApiError,
  asyncHandler,
  AppError,
} from './errorHandler';

// Request validation
export { validateRequest } from './validateRequest';

// Rate limiting
export { apiLimiter, webhookLimiter } from './rateLimiter';
