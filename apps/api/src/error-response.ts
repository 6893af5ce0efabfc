import { AppError, ValidationError } from "@lexrag/errors";

export interface ErrorEnvelope {
  success: false;
  error: {
    code: string;
    message: string;
    requestId: string;
    details?: Record<string, unknown>;
  };
}

export interface HandlerResult<T> {
  status: number;
  body: T;
}

/** Shape of the client errors express.json() raises through http-errors. */
interface BodyParserError {
  type: string;
  status: number;
  expose: true;
  message: string;
}

function isBodyParserError(err: unknown): err is BodyParserError {
  return (
    err instanceof Error &&
    "type" in err &&
    typeof err.type === "string" &&
    "status" in err &&
    typeof err.status === "number" &&
    "expose" in err &&
    err.expose === true
  );
}

function fromBodyParser(err: BodyParserError): AppError {
  if (err.type === "entity.parse.failed") {
    return new ValidationError("Malformed JSON body");
  }
  // e.g. "entity.too.large" -> "ENTITY_TOO_LARGE"
  return new AppError({
    message: err.message,
    statusCode: err.status,
    code: err.type.replace(/\./g, "_").toUpperCase(),
    cause: err,
  });
}

/**
 * Map any thrown value to the HTTP status and error envelope. Errors that
 * are not `AppError`s are reported as a bare 500 so internals do not leak.
 */
export function toErrorResponse(err: unknown, requestId: string): HandlerResult<ErrorEnvelope> {
  const error = isBodyParserError(err) ? fromBodyParser(err) : err;

  if (AppError.isAppError(error)) {
    const details =
      error instanceof ValidationError && Object.keys(error.fields).length > 0
        ? { ...error.details, fields: error.fields }
        : error.details;

    return {
      status: error.statusCode,
      body: {
        success: false,
        error: {
          code: error.code,
          message: error.message,
          requestId,
          ...(details ? { details } : {}),
        },
      },
    };
  }

  return {
    status: 500,
    body: {
      success: false,
      error: { code: "INTERNAL_ERROR", message: "Internal server error", requestId },
    },
  };
}
