// backend/services/shared/src/health.ts

/**
 * Why:
 * - Liveness answers "is the process up?" (no dependencies).
 * - Readiness answers "can this instance take traffic?" via an optional,
 *   fast check supplied by the service.
 * - Every response carries `requestId` so failures correlate with logs.
 */

import express, { type Request, type Response } from "express";
import { asyncHandler } from "./middleware/asyncHandler";
import { requestIdOf } from "./middleware/requestId";

export type ReadinessDetails = Record<string, unknown>;
export type ReadinessFn = () => Promise<ReadinessDetails> | ReadinessDetails;

type Options = {
  service: string;
  readiness?: ReadinessFn;
};

/**
 * Exposes:
 *   GET /health, /health/live, /healthz   -> liveness
 *   GET /health/ready, /readyz            -> readiness
 */
export function createHealthRouter(opts: Options): express.Router {
  const router = express.Router();

  const liveness = (req: Request, res: Response) => {
    res.json({ service: opts.service, ok: true, requestId: requestIdOf(req) });
  };

  const readiness = asyncHandler(async (req, res) => {
    try {
      const details = opts.readiness ? await opts.readiness() : {};
      res.json({
        service: opts.service,
        ok: true,
        requestId: requestIdOf(req),
        ...details,
      });
    } catch (err) {
      // 503 tells orchestrators "not ready"; message only, no stack.
      res.status(503).json({
        service: opts.service,
        ok: false,
        requestId: requestIdOf(req),
        error: err instanceof Error ? err.message : String(err),
      });
    }
  });

  router.get("/health", liveness);
  router.get("/health/live", liveness);
  router.get("/healthz", liveness);
  router.get("/health/ready", readiness);
  router.get("/readyz", readiness);

  return router;
}
