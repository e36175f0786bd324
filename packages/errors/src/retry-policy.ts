import { AppError } from "./app-error.js";

/**
 * Decide whether a failed query is worth running again.
 *
 * - Non-operational errors (bad template, dimension mismatch) are never retried.
 * - Client errors (4xx) are not retried, except rate limiting (429).
 * - Server errors (5xx) and unknown errors (network failures) are retried.
 *
 * The pipeline itself never retries; this is for the caller.
 */
export function isRetryable(error: unknown): boolean {
  if (AppError.isAppError(error)) {
    if (!error.isOperational) {
      return false;
    }

    if (error.statusCode === 429) {
      return true;
    }

    if (error.statusCode >= 400 && error.statusCode < 500) {
      return false;
    }

    return error.statusCode >= 500;
  }

  return true;
}
