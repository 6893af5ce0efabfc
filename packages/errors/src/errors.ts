import { AppError } from "./app-error.js";

interface ErrorOptions {
  requestId?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string> = {}, options?: ErrorOptions) {
    super({
      message,
      statusCode: 400,
      code: "VALIDATION_ERROR",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
    this.fields = fields;
  }
}

export class ConflictError extends AppError {
  constructor(message = "Conflict", options?: ErrorOptions) {
    super({
      message,
      statusCode: 409,
      code: "CONFLICT",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

/**
 * The index/chunk pair is missing, corrupt or inconsistent. The service is
 * not ready until a valid pair is loaded.
 */
export class IndexUnavailableError extends AppError {
  constructor(message = "Index unavailable", options?: ErrorOptions) {
    super({
      message,
      statusCode: 503,
      code: "INDEX_UNAVAILABLE",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

/**
 * A vector's length disagrees with the dimensionality fixed for the index
 * or the embedder. Signals embedder/index version skew.
 */
export class DimensionMismatchError extends AppError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(expected: number, actual: number, options?: ErrorOptions) {
    super({
      message: `Dimension mismatch: expected ${String(expected)}, got ${String(actual)}`,
      statusCode: 500,
      code: "DIMENSION_MISMATCH",
      isOperational: false,
      requestId: options?.requestId,
      details: { expected, actual, ...options?.details },
      cause: options?.cause,
    });
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * A search hit points past the end of the chunk list: the chunk list and the
 * index no longer describe the same corpus.
 */
export class IndexOutOfRangeError extends AppError {
  public readonly row: number;
  public readonly size: number;

  constructor(row: number, size: number, options?: ErrorOptions) {
    super({
      message: `Row ${String(row)} is out of range for ${String(size)} chunks`,
      statusCode: 500,
      code: "INDEX_OUT_OF_RANGE",
      isOperational: false,
      requestId: options?.requestId,
      details: { row, size, ...options?.details },
      cause: options?.cause,
    });
    this.row = row;
    this.size = size;
  }
}

export class RetrievalError extends AppError {
  constructor(message = "Retrieval failed", options?: ErrorOptions) {
    super({
      message,
      statusCode: 502,
      code: "RETRIEVAL_FAILED",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class GenerationError extends AppError {
  constructor(message = "Generation failed", options?: ErrorOptions) {
    super({
      message,
      statusCode: 502,
      code: "GENERATION_FAILED",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class ReindexError extends AppError {
  constructor(message = "Reindex failed", options?: ErrorOptions) {
    super({
      message,
      statusCode: 500,
      code: "REINDEX_FAILED",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(message = "External service error", service: string, options?: ErrorOptions) {
    super({
      message,
      statusCode: 502,
      code: "EXTERNAL_SERVICE_ERROR",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
    this.service = service;
  }
}
