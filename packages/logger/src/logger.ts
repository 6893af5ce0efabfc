/**
 * Structured Pino loggers: pretty output in development, JSON elsewhere,
 * credentials redacted everywhere.
 */

import pino, { type DestinationStream, type Logger as PinoLogger } from "pino";
import { REDACT_PATHS, REDACTED, redactValue } from "./redaction.js";

export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Log level (defaults to "info", or "debug" when NODE_ENV is "development"). */
  level?: string;
  /** Logical service / component name attached to every log line. */
  service?: string;
  /** Explicit output stream; disables the pretty transport. */
  destination?: DestinationStream;
}

function isDevelopment(): boolean {
  return process.env["NODE_ENV"] === "development";
}

function buildTransport(): pino.TransportSingleOptions | undefined {
  if (isDevelopment()) {
    return {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }
  return undefined;
}

export function createLogger(options?: CreateLoggerOptions): Logger {
  const level = options?.level ?? (isDevelopment() ? "debug" : "info");
  const service = options?.service ?? "lexrag";

  const baseOptions: pino.LoggerOptions = {
    level,
    name: service,
    redact: {
      paths: REDACT_PATHS,
      censor: REDACTED,
    },
    formatters: {
      log: (object) =>
        Object.fromEntries(Object.entries(object).map(([key, value]) => [key, redactValue(key, value)])),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (options?.destination) {
    return pino(baseOptions, options.destination);
  }

  const transport = buildTransport();
  return pino({ ...baseOptions, ...(transport ? { transport } : {}) });
}

/**
 * Child logger with request- or component-scoped bindings
 * (e.g. `requestId`, `component`).
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}

/**
 * Logger that drops everything; for tests and library defaults.
 */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
