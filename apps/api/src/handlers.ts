import type { HealthStatus, IngestionSummary, RagResponse } from "@lexrag/types";
import type { QueryService } from "@lexrag/core";
import type { HandlerResult } from "./error-response.js";

/** The part of the query service the HTTP surface calls. */
export type RagService = Pick<QueryService, "answer" | "health" | "reindex">;

export interface ReindexResponse extends IngestionSummary {
  ok: true;
}

// Handlers return status and body instead of touching `res`; errors are
// thrown and turned into envelopes by the error middleware.

export async function handleRag(
  service: RagService,
  body: unknown,
  requestId: string,
): Promise<HandlerResult<RagResponse>> {
  return { status: 200, body: await service.answer(body, { requestId }) };
}

export function handleHealth(service: RagService): HandlerResult<HealthStatus> {
  const health = service.health();
  return { status: health.ok ? 200 : 503, body: health };
}

export async function handleReindex(service: RagService): Promise<HandlerResult<ReindexResponse>> {
  const summary = await service.reindex();
  return { status: 200, body: { ok: true, ...summary } };
}
