// backend/services/shared/src/middleware/httpLogger.ts

/**
 * Why:
 * - Consistent, structured request logs so ops can filter by `service` and
 *   correlate by `reqId`.
 * - Telemetry only; never blocks a request.
 *
 * Order:
 * - Mount immediately after `requestIdMiddleware` so `req.id` is populated.
 *
 * Notes:
 * - Severity mapping: 2xx/3xx=info, 4xx=warn, 5xx/error=error.
 * - Health probes are not logged.
 */

import pinoHttp from "pino-http";
import type { IncomingMessage, ServerResponse } from "node:http";
import type { Logger } from "../utils/logger";

const QUIET_PATHS = new Set([
  "/health",
  "/health/live",
  "/health/ready",
  "/healthz",
  "/readyz",
  "/favicon.ico",
]);

export function makeHttpLogger(rootLogger: Logger, serviceName: string) {
  const logger = rootLogger.child({ component: "http" });

  return pinoHttp({
    logger,

    // requestIdMiddleware has already set req.id.
    genReqId: (req) => req.id,

    customLogLevel: (
      _req: IncomingMessage,
      res: ServerResponse,
      err?: Error
    ) => {
      if (err) return "error";
      const s = res.statusCode;
      if (s >= 500) return "error";
      if (s >= 400) return "warn";
      return "info";
    },

    customProps: (req: IncomingMessage) => ({
      service: serviceName,
      reqId: req.id,
    }),

    autoLogging: {
      ignore: (req: IncomingMessage) => QUIET_PATHS.has(req.url ?? ""),
    },

    serializers: {
      req(req: IncomingMessage) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: ServerResponse) {
        return { statusCode: res.statusCode };
      },
      err(err: Error) {
        return { type: err.name, msg: err.message };
      },
    },
  });
}
