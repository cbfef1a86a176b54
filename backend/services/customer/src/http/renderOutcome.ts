// backend/services/customer/src/http/renderOutcome.ts
import type { Response } from "express";
import { conflict, notFound, zValidationError } from "@shared/http/errors";
import type { Outcome } from "../operations/outcome";

function unreachable(x: never): never {
  throw new Error(`Unhandled outcome: ${JSON.stringify(x)}`);
}

/** HTTP status for each outcome. */
export function statusFor(outcome: Outcome): number {
  switch (outcome.kind) {
    case "listed":
    case "found":
    case "updated":
      return 200;
    case "created":
      return 201;
    case "deleted":
      return 204;
    case "badRequest":
      return 400;
    case "notFound":
    case "routeNotFound":
      return 404;
    case "conflict":
      return 409;
    default:
      return unreachable(outcome);
  }
}

/**
 * The one place domain outcomes become responses.
 * - Bodies: arrays/objects for reads, none for successful writes.
 * - Failures carry Problem+JSON, except an unmatched route which has no body.
 */
export function renderOutcome(
  res: Response,
  outcome: Outcome,
  instance?: string
): void {
  const status = statusFor(outcome);
  switch (outcome.kind) {
    case "listed":
      res.status(status).json(outcome.customers);
      return;
    case "found":
      res.status(status).json(outcome.customer);
      return;
    case "created":
    case "updated":
    case "deleted":
    case "routeNotFound":
      res.status(status).end();
      return;
    case "conflict":
      conflict(res, `Customer "${outcome.guid}" already exists`, instance);
      return;
    case "notFound":
      notFound(res, `Customer "${outcome.guid}" not found`, instance);
      return;
    case "badRequest":
      zValidationError(res, outcome.issues, instance);
      return;
    default:
      unreachable(outcome);
  }
}
