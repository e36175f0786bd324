import { AppError } from "./app-error.js";

interface FailureOptions {
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string>, options?: FailureOptions) {
    super({
      message,
      statusCode: 400,
      code: "VALIDATION_ERROR",
      details: options?.details,
      cause: options?.cause,
    });
    this.fields = fields;
  }
}

export type EmbeddingFailureReason =
  | "invalid_input"
  | "transport"
  | "timeout"
  | "invalid_response"
  | "dimension_mismatch";

export class EmbeddingError extends AppError {
  public readonly reason: EmbeddingFailureReason;

  constructor(message: string, reason: EmbeddingFailureReason, options?: FailureOptions) {
    super({
      message,
      statusCode: reason === "invalid_input" ? 400 : 502,
      code: "EMBEDDING_ERROR",
      // A model returning the wrong dimension is a deployment mismatch, not a blip.
      isOperational: reason !== "dimension_mismatch",
      details: { reason, ...options?.details },
      cause: options?.cause,
    });
    this.reason = reason;
  }
}

export class DimensionMismatchError extends AppError {
  public readonly left: number;
  public readonly right: number;

  constructor(left: number, right: number, options?: FailureOptions) {
    super({
      message: `Vector dimensions differ: ${String(left)} vs ${String(right)}`,
      statusCode: 500,
      code: "DIMENSION_MISMATCH",
      isOperational: false,
      details: { left, right, ...options?.details },
    });
    this.left = left;
    this.right = right;
  }
}

export type RetrievalStage = "store" | "rerank";

export class RetrievalError extends AppError {
  public readonly stage: RetrievalStage;

  constructor(message: string, stage: RetrievalStage, options?: FailureOptions) {
    super({
      message,
      statusCode: 502,
      code: "RETRIEVAL_ERROR",
      details: { stage, ...options?.details },
      cause: options?.cause,
    });
    this.stage = stage;
  }
}

/** Raised for a missing or malformed prompt template. Fatal for the process. */
export class TemplateError extends AppError {
  public readonly template: string;

  constructor(message: string, template: string, options?: FailureOptions) {
    super({
      message,
      statusCode: 500,
      code: "TEMPLATE_ERROR",
      isOperational: false,
      details: { template, ...options?.details },
      cause: options?.cause,
    });
    this.template = template;
  }
}

export type GenerationFailureReason = "transport" | "rate_limited" | "empty_response";

export class GenerationError extends AppError {
  public readonly reason: GenerationFailureReason;
  public readonly model: string;

  constructor(
    message: string,
    reason: GenerationFailureReason,
    model: string,
    options?: FailureOptions,
  ) {
    super({
      message,
      statusCode: reason === "rate_limited" ? 429 : 502,
      code: reason === "rate_limited" ? "RATE_LIMITED" : "GENERATION_ERROR",
      details: { reason, model, ...options?.details },
      cause: options?.cause,
    });
    this.reason = reason;
    this.model = model;
  }
}
