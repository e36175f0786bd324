export { AppError, statusOf, messageOf } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  ValidationError,
  EmbeddingError,
  DimensionMismatchError,
  RetrievalError,
  TemplateError,
  GenerationError,
} from "./errors.js";
export type {
  EmbeddingFailureReason,
  RetrievalStage,
  GenerationFailureReason,
} from "./errors.js";

export { createCircuitBreaker, DEFAULT_BREAKER_OPTIONS } from "./circuit-breaker.js";
export type { CircuitBreakerOptions, CircuitStateListener } from "./circuit-breaker.js";

export { isRetryable } from "./retry-policy.js";
