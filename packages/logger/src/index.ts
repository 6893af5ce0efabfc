/**
 * @lexrag/logger
 *
 * Structured logging with credential redaction.
 */

export { createLogger, createChildLogger, createSilentLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { redactValue, REDACT_PATHS, REDACTED } from "./redaction.js";
