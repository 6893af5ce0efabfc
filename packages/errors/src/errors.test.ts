import { describe, it, expect } from "vitest";
import { AppError, errorMessage } from "./app-error.js";
import {
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

describe("AppError", () => {
  it("creates error with all properties", () => {
    const cause = new Error("root cause");
    const err = new AppError({
      message: "test error",
      statusCode: 500,
      code: "INTERNAL",
      isOperational: false,
      requestId: "req-1",
      details: { foo: "bar" },
      cause,
    });

    expect(err.message).toBe("test error");
    expect(err.statusCode).toBe(500);
    expect(err.code).toBe("INTERNAL");
    expect(err.isOperational).toBe(false);
    expect(err.requestId).toBe("req-1");
    expect(err.details).toEqual({ foo: "bar" });
    expect(err.cause).toBe(cause);
    expect(err.name).toBe("AppError");
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(AppError);
  });

  it("defaults isOperational to true", () => {
    const err = new AppError({ message: "test", statusCode: 400, code: "BAD" });
    expect(err.isOperational).toBe(true);
  });

  it("isAppError detects AppError instances", () => {
    const appErr = new AppError({ message: "test", statusCode: 500, code: "ERR" });

    expect(AppError.isAppError(appErr)).toBe(true);
    expect(AppError.isAppError(new Error("plain"))).toBe(false);
    expect(AppError.isAppError(null)).toBe(false);
    expect(AppError.isAppError("string")).toBe(false);
  });
});

describe("errorMessage", () => {
  it("reads the message of Error instances", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
  });

  it("stringifies other thrown values", () => {
    expect(errorMessage("plain")).toBe("plain");
    expect(errorMessage(42)).toBe("42");
  });
});

describe("Error Subclasses", () => {
  it("ValidationError has status 400, VALIDATION_ERROR code, and fields", () => {
    const err = new ValidationError("Invalid query", { query: "too short" });
    expect(err.statusCode).toBe(400);
    expect(err.code).toBe("VALIDATION_ERROR");
    expect(err.fields).toEqual({ query: "too short" });
    expect(err.name).toBe("ValidationError");
  });

  it("ValidationError defaults fields to an empty object", () => {
    expect(new ValidationError().fields).toEqual({});
  });

  it("ConflictError has status 409", () => {
    const err = new ConflictError();
    expect(err.statusCode).toBe(409);
    expect(err.code).toBe("CONFLICT");
  });

  it("IndexUnavailableError has status 503", () => {
    const err = new IndexUnavailableError("chunks.json missing");
    expect(err.statusCode).toBe(503);
    expect(err.code).toBe("INDEX_UNAVAILABLE");
    expect(err.message).toBe("chunks.json missing");
    expect(err.isOperational).toBe(true);
  });

  it("DimensionMismatchError is non-operational and records both sizes", () => {
    const err = new DimensionMismatchError(384, 256);
    expect(err.message).toBe("Dimension mismatch: expected 384, got 256");
    expect(err.expected).toBe(384);
    expect(err.actual).toBe(256);
    expect(err.isOperational).toBe(false);
    expect(err.details).toEqual({ expected: 384, actual: 256 });
    expect(err.name).toBe("DimensionMismatchError");
  });

  it("IndexOutOfRangeError is non-operational", () => {
    const err = new IndexOutOfRangeError(7, 3);
    expect(err.message).toBe("Row 7 is out of range for 3 chunks");
    expect(err.isOperational).toBe(false);
    expect(err.code).toBe("INDEX_OUT_OF_RANGE");
  });

  it("RetrievalError and GenerationError are distinct 502 errors", () => {
    const retrieval = new RetrievalError();
    const generation = new GenerationError();
    expect(retrieval.statusCode).toBe(502);
    expect(generation.statusCode).toBe(502);
    expect(retrieval.code).toBe("RETRIEVAL_FAILED");
    expect(generation.code).toBe("GENERATION_FAILED");
    expect(retrieval).not.toBeInstanceOf(GenerationError);
  });

  it("ReindexError has status 500", () => {
    expect(new ReindexError().code).toBe("REINDEX_FAILED");
  });

  it("ExternalServiceError has status 502, EXTERNAL_SERVICE_ERROR code, and service", () => {
    const err = new ExternalServiceError("Embedding server is down", "embedding-server");
    expect(err.statusCode).toBe(502);
    expect(err.code).toBe("EXTERNAL_SERVICE_ERROR");
    expect(err.service).toBe("embedding-server");
  });
});
