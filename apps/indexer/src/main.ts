import { parseEnv } from "@lexrag/config";
import { ingestionDependenciesFor, queryServiceConfig } from "@lexrag/core";
import { createLogger } from "@lexrag/logger";
import { runIngestion } from "./run-ingestion.js";

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "lexrag-indexer" });

  const summary = await runIngestion(
    queryServiceConfig(config).ingestion,
    ingestionDependenciesFor(config, logger),
    logger,
  );

  logger.info({ ...summary }, "Index build complete");
}

main().catch((err: unknown) => {
  console.error("[indexer] Fatal error:", err);
  process.exit(1);
});
