export { AppError, errorMessage } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  ValidationError,
  ConflictError,
  IndexUnavailableError,
  DimensionMismatchError,
  IndexOutOfRangeError,
  RetrievalError,
  GenerationError,
  ReindexError,
  ExternalServiceError,
} from "./errors.js";

export { createCircuitBreaker } from "./circuit-breaker.js";
export type { CircuitBreakerOptions } from "./circuit-breaker.js";

export { withRetry } from "./retry.js";
export type { RetryOptions } from "./retry.js";
