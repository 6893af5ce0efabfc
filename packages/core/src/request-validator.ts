import { z } from "zod";
import type { RagRequest } from "@lexrag/types";
import { ValidationError } from "@lexrag/errors";

export interface RequestLimits {
  minQueryLength: number;
  topKDefault: number;
  topKMax: number;
}

export interface ValidatedQuery {
  query: string;
  topK: number;
  formatJson: boolean;
}

export function createRagRequestSchema(limits: RequestLimits) {
  return z.object({
    query: z
      .string({ required_error: "query is required", invalid_type_error: "query must be a string" })
      .trim()
      .min(limits.minQueryLength, `query must be at least ${String(limits.minQueryLength)} characters`),
    top_k: z
      .number({ invalid_type_error: "top_k must be a number" })
      .int("top_k must be an integer")
      .min(1, "top_k must be at least 1")
      .default(limits.topKDefault)
      .transform((value) => Math.min(value, limits.topKMax)),
    format_json: z.boolean({ invalid_type_error: "format_json must be a boolean" }).default(true),
  });
}

/**
 * Validate a request body. `top_k` above the configured maximum is clamped
 * rather than rejected.
 */
export function validateRagRequest(body: unknown, limits: RequestLimits): ValidatedQuery {
  const result = createRagRequestSchema(limits).safeParse(body);

  if (!result.success) {
    const fields: Record<string, string> = {};
    for (const issue of result.error.issues) {
      const key = issue.path.length > 0 ? issue.path.join(".") : "body";
      fields[key] ??= issue.message;
    }
    throw new ValidationError("Invalid query request", fields);
  }

  const parsed: Required<RagRequest> = result.data;
  return { query: parsed.query, topK: parsed.top_k, formatJson: parsed.format_json };
}
