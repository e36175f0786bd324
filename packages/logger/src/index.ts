/**
 * @benchrag/logger
 *
 * Structured logging with secret redaction, plus the latency timer.
 */

export { createLogger, createChildLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { redactValue, REDACT_PATHS } from "./pii-redactor.js";
export { ProcessTimer } from "./process-timer.js";
export type { TimingHook, TimerClock } from "./process-timer.js";
