import express, { type ErrorRequestHandler, type Express, type Request, type RequestHandler } from "express";
import cors from "cors";
import type { Logger } from "@lexrag/logger";
import { toErrorResponse, type ErrorEnvelope, type HandlerResult } from "./error-response.js";
import { handleHealth, handleRag, handleReindex, type RagService } from "./handlers.js";
import { getRequestId, requestIdMiddleware } from "./request-id.js";

export interface AppOptions {
  service: RagService;
  logger: Logger;
  /** Allowed origins; `*` allows any. */
  corsOrigins: string[];
}

function route<T>(handler: (req: Request) => HandlerResult<T> | Promise<HandlerResult<T>>): RequestHandler {
  return (req, res, next) => {
    Promise.resolve()
      .then(() => handler(req))
      .then(({ status, body }) => {
        res.status(status).json(body);
      })
      .catch(next);
  };
}

function accessLog(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      logger.info(
        {
          requestId: getRequestId(req),
          method: req.method,
          path: req.path,
          status: res.statusCode,
          durationMs: Date.now() - start,
        },
        "request completed",
      );
    });
    next();
  };
}

function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    const requestId = getRequestId(req);
    const { status, body } = toErrorResponse(err, requestId);

    if (status >= 500) {
      logger.error({ err, requestId }, "request failed");
    } else {
      logger.warn({ requestId, code: body.error.code }, body.error.message);
    }
    res.status(status).json(body);
  };
}

export function createApp(options: AppOptions): Express {
  const { service, logger, corsOrigins } = options;
  const app = express();

  app.disable("x-powered-by");
  app.use(
    cors({
      origin: corsOrigins.includes("*") ? true : corsOrigins,
      credentials: true,
    }),
  );
  app.use(requestIdMiddleware);
  app.use(accessLog(logger));
  app.use(express.json({ limit: "1mb" }));

  app.post("/rag", route((req) => handleRag(service, req.body, getRequestId(req))));
  app.get("/health", route(() => handleHealth(service)));
  app.post("/reindex", route(() => handleReindex(service)));

  app.use((req, res) => {
    const body: ErrorEnvelope = {
      success: false,
      error: {
        code: "NOT_FOUND",
        message: `No route for ${req.method} ${req.path}`,
        requestId: getRequestId(req),
      },
    };
    res.status(404).json(body);
  });
  app.use(errorHandler(logger));

  return app;
}
