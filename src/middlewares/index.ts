/**
 * Middleware Exports
 *
 * Central export point for all middleware modules.
 */

// Error handling
export { errorHandler, notFoundHandler, ApiError } from './errorHandler';
export type { AppError } from './errorHandler';

// Request validation
export { validateRequest } from './validateRequest';

// Rate limiting
export { globalLimiter, ledgerLimiter } from './rateLimiter';

// Idempotency
export {
  idempotencyMiddleware,
  idempotencyForMutations,
  validateIdempotencyKey,
} from './idempotency';
