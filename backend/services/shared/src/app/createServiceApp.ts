// backend/services/shared/src/app/createServiceApp.ts

/**
 * Why:
 * - One builder assembles the internal stack every service shares:
 *   requestId → http logger → health (open) → routes → bare 404 →
 *   Problem+JSON error tail.
 *
 * Notes:
 * - Routes are mounted by the service through `mountRoutes`; the builder never
 *   knows about domain handlers.
 * - No global body parser: a route that takes a body parses it itself, so a
 *   bad body on any other request is never read. Parser failures still land
 *   in the error tail (400 / 413).
 */

import express, { type Express } from "express";
import type { Logger } from "../utils/logger";
import { requestIdMiddleware } from "../middleware/requestId";
import { makeHttpLogger } from "../middleware/httpLogger";
import { notFoundBare, errorProblemJson } from "../middleware/problemJson";
import { createHealthRouter, type ReadinessFn } from "../health";

export type CreateServiceAppOptions = {
  /** Service slug (e.g., "customer"). Used in logs and health bodies. */
  serviceName: string;
  /** Root logger for this process; the app takes children of it. */
  logger: Logger;
  /** Mount path for the service router (e.g., "/" or "/api"). */
  apiPrefix: string;
  /** Mounts the service's routes onto the provided Router. */
  mountRoutes: (router: express.Router) => void;
  /** Health readiness hook (optional). */
  readiness?: ReadinessFn;
};

export function createServiceApp(opts: CreateServiceAppOptions): Express {
  const { serviceName, logger, apiPrefix, mountRoutes, readiness } = opts;

  const app = express();
  app.disable("x-powered-by");

  // ── Transport & telemetry ───────────────────────────────────────────────────
  app.use(requestIdMiddleware());
  app.use(makeHttpLogger(logger, serviceName));

  // ── Health (public) ─────────────────────────────────────────────────────────
  app.use(createHealthRouter({ service: serviceName, readiness }));

  // ── Routes ──────────────────────────────────────────────────────────────────
  const api = express.Router();
  mountRoutes(api);
  app.use(apiPrefix, api);

  // ── Tails: 404 + error formatter ────────────────────────────────────────────
  app.use(notFoundBare());
  app.use(errorProblemJson(logger));

  return app;
}
