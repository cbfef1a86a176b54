// backend/services/shared/src/middleware/requestId.ts

/**
 * Why:
 * - Every inbound request carries a stable correlation key so log lines and
 *   Problem+JSON bodies for the same request can be tied together.
 *
 * Notes:
 * - Must run before the HTTP logger.
 * - Never overwrites a caller-supplied ID; a UUID is minted only when none of
 *   `x-request-id`, `x-correlation-id`, `x-amzn-trace-id` is present.
 */

import type { Request, RequestHandler } from "express";
import { randomUUID } from "node:crypto";

const HEADERS = ["x-request-id", "x-correlation-id", "x-amzn-trace-id"];

function inboundId(req: Request): string | undefined {
  for (const name of HEADERS) {
    const hdr = req.headers[name];
    const v = Array.isArray(hdr) ? hdr[0] : hdr;
    if (v && v.trim()) return v.trim();
  }
  return undefined;
}

export function requestIdMiddleware(): RequestHandler {
  return (req, res, next) => {
    const id = inboundId(req) ?? randomUUID();
    req.id = id;
    res.setHeader("x-request-id", id);
    next();
  };
}

/** Request id as a string, whatever pino-http or this middleware stored. */
export function requestIdOf(req: Request): string | undefined {
  return req.id == null ? undefined : String(req.id);
}
