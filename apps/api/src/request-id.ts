import { randomUUID } from "node:crypto";
import type { Request, Response, NextFunction } from "express";

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

const REQUEST_ID_HEADER = "x-request-id";
const MAX_INBOUND_ID_LENGTH = 128;

/**
 * Reuse the caller's `X-Request-Id` when it looks sane, otherwise mint one,
 * and echo it on the response.
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const inbound = req.header(REQUEST_ID_HEADER);
  const requestId =
    inbound && inbound.length <= MAX_INBOUND_ID_LENGTH && /^[\w.-]+$/.test(inbound) ? inbound : randomUUID();

  req.requestId = requestId;
  res.setHeader(REQUEST_ID_HEADER, requestId);
  next();
}

export function getRequestId(req: Request): string {
  return req.requestId ?? "unknown";
}
