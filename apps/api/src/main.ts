import { parseEnv } from "@lexrag/config";
import { createQueryService } from "@lexrag/core";
import { createLogger } from "@lexrag/logger";
import { createApp } from "./app.js";

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "lexrag-api" });
  const service = createQueryService(config, logger);

  try {
    await service.load();
  } catch (err) {
    // Stay up: /health reports 503 and POST /reindex can build the first index.
    logger.warn({ err, indexDir: config.paths.indexDir }, "Started without an index");
  }
  await service.checkEmbedder();

  const app = createApp({ service, logger, corsOrigins: config.cors.origins });
  const server = app.listen(config.port, () => {
    logger.info({ port: config.port }, "API listening");
  });

  const shutdown = (): void => {
    logger.info("Shutting down");
    service.close();
    server.close(() => {
      process.exit(0);
    });
  };

  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
}

main().catch((err: unknown) => {
  console.error("[api] Fatal error:", err);
  process.exit(1);
});
