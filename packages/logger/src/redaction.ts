/**
 * Secret and PII redaction for log output.
 *
 * Provider credentials travel through config objects that are easy to log by
 * accident, and user questions can contain email addresses.
 */

const REDACTED = "[REDACTED]";

/**
 * Property names whose values are always replaced, in their logged casing.
 */
const SENSITIVE_KEYS = [
  "apiKey",
  "api_key",
  "cohereApiKey",
  "geminiApiKey",
  "token",
  "secret",
  "password",
  "authorization",
  "cookie",
] as const;

const SENSITIVE_KEY_SET: ReadonlySet<string> = new Set(
  SENSITIVE_KEYS.map((key) => key.toLowerCase()),
);

const EMAIL_REGEX = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

/**
 * Redact a single key/value pair.
 *
 * Sensitive keys (matched case-insensitively) lose their whole value; email
 * addresses inside other string values are masked in place.
 */
export function redactValue(key: string, value: unknown): unknown {
  if (SENSITIVE_KEY_SET.has(key.toLowerCase())) {
    return REDACTED;
  }

  if (typeof value === "string") {
    return value.replace(EMAIL_REGEX, REDACTED);
  }

  return value;
}

/**
 * Paths for Pino's `redact` option: every sensitive key at the top level and
 * one level down (e.g. `config.geminiApiKey`, `headers.authorization`).
 */
export const REDACT_PATHS: string[] = [
  ...SENSITIVE_KEYS,
  ...SENSITIVE_KEYS.map((key) => `*.${key}`),
];

export { REDACTED };
