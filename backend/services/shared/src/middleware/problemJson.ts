// backend/services/shared/src/middleware/problemJson.ts

/**
 * Why:
 * - Error responses are RFC 7807 Problem+JSON so clients and tests can rely on
 *   one shape across services.
 * - Unmatched routes are a bare 404: there is no resource to describe.
 *
 * Notes:
 * - Transport-level formatting only; domain outcomes are rendered by the
 *   service before anything reaches this tail.
 * - 5xx details never leak the thrown message.
 */

import type { ErrorRequestHandler, RequestHandler } from "express";
import type { Logger } from "../utils/logger";
import { errorFields } from "../utils/logger";
import { requestIdOf } from "./requestId";
import { problemBody } from "../http/errors";

/** Terminal 404 for anything no router claimed. */
export function notFoundBare(): RequestHandler {
  return (_req, res) => {
    res.status(404).end();
  };
}

function statusOf(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    const raw =
      "statusCode" in err
        ? Number(err.statusCode)
        : "status" in err
        ? Number(err.status)
        : NaN;
    if (Number.isInteger(raw) && raw >= 400 && raw < 600) return raw;
  }
  return 500;
}

/** body-parser tags its failures with a string `type`. */
function parserType(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "type" in err) {
    return typeof err.type === "string" ? err.type : undefined;
  }
  return undefined;
}

export function errorProblemJson(logger: Logger): ErrorRequestHandler {
  const log = logger.child({ component: "problemJson" });

  return (err, req, res, next) => {
    if (res.headersSent) return next(err);

    const status = statusOf(err);
    const instance = requestIdOf(req);

    if (status >= 500) {
      log.error(
        { reqId: instance, path: req.originalUrl, err: errorFields(err) },
        "request_failed"
      );
      return res
        .status(status)
        .type("application/problem+json")
        .json(
          problemBody({
            title: "Internal Server Error",
            status,
            code: "INTERNAL_ERROR",
            detail: "Unexpected error",
            instance,
          })
        );
    }

    const kind = parserType(err);
    log.warn(
      { reqId: instance, path: req.originalUrl, status, kind },
      "request_rejected"
    );

    if (kind === "entity.parse.failed") {
      return res
        .status(400)
        .type("application/problem+json")
        .json(
          problemBody({
            title: "Bad Request",
            status: 400,
            code: "BAD_REQUEST",
            detail: "Request body is not valid JSON",
            instance,
          })
        );
    }

    if (kind === "entity.too.large") {
      return res
        .status(413)
        .type("application/problem+json")
        .json(
          problemBody({
            title: "Payload Too Large",
            status: 413,
            code: "PAYLOAD_TOO_LARGE",
            detail: "Request body exceeds the configured limit",
            instance,
          })
        );
    }

    const message =
      err instanceof Error && err.message ? err.message : "Request Error";
    return res
      .status(status)
      .type("application/problem+json")
      .json(
        problemBody({
          title: "Request Error",
          status,
          code: "REQUEST_ERROR",
          detail: message,
          instance,
        })
      );
  };
}
