export { ingest, embedInBatches } from "./ingestion-pipeline.js";
export type { IngestionDependencies, IngestionInput, IngestionResult } from "./ingestion-pipeline.js";

export { retrieve, distanceToScore } from "./retriever.js";
export type { RetrieverDependencies } from "./retriever.js";

export { loadRecords, parseRecords } from "./record-loader.js";
export type { RecordFilterOptions } from "./record-loader.js";
export { extractChunks } from "./extract-chunks.js";

export { IndexHolder } from "./index-holder.js";
export type { IndexSnapshot } from "./index-holder.js";

export { QueryRun, canTransition, isFinal, validNextPhases } from "./query-state.js";
export { validateRagRequest, createRagRequestSchema } from "./request-validator.js";
export type { RequestLimits, ValidatedQuery } from "./request-validator.js";

export { QueryService, queryServiceConfig, preview, NO_CONTEXT_ANSWER } from "./query-service.js";
export type {
  QueryServiceConfig,
  QueryServiceDependencies,
  AnswerContext,
} from "./query-service.js";

export {
  createQueryService,
  embeddingProviderFor,
  indexStoreFor,
  ingestionDependenciesFor,
} from "./runtime.js";
