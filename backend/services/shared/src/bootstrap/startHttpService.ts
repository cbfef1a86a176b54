// backend/services/shared/src/bootstrap/startHttpService.ts

/**
 * Why:
 * - Starting/stopping an HTTP server is a single concern: bind, harden socket
 *   timeouts, log where it landed (port 0 gives an ephemeral port), shut down
 *   cleanly on SIGINT/SIGTERM.
 *
 * Notes:
 * - `process.once` keeps repeated calls from stacking signal handlers.
 * - Resolves only after the socket is listening, so `boundPort` is real.
 */

import type { Express } from "express";
import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import type { Logger } from "../utils/logger";
import { errorFields } from "../utils/logger";

export interface StartHttpServiceOptions {
  app: Express;
  host: string;
  port: number;
  serviceName: string;
  logger: Logger;
}

export interface StartedService {
  server: Server;
  boundPort: number;
  stop: () => Promise<void>;
}

function portOf(addr: AddressInfo | string | null, fallback: number): number {
  return addr && typeof addr === "object" ? addr.port : fallback;
}

export function startHttpService(
  opts: StartHttpServiceOptions
): Promise<StartedService> {
  const { app, host, port, serviceName, logger } = opts;

  return new Promise<StartedService>((resolve, reject) => {
    const server = app.listen(port, host);

    // headersTimeout must stay above keepAliveTimeout
    server.keepAliveTimeout = 7_000;
    server.headersTimeout = 9_000;

    const stop = () =>
      new Promise<void>((done, fail) => {
        server.close((err) => (err ? fail(err) : done()));
      });

    server.once("error", (err) => {
      logger.error(
        { service: serviceName, err: errorFields(err) },
        "http server error"
      );
      reject(err);
    });

    server.once("listening", () => {
      const boundPort = portOf(server.address(), port);
      logger.info(
        { service: serviceName, host, port: boundPort },
        "service listening"
      );

      const shutdown = (signal: string) => {
        logger.info({ signal, service: serviceName }, "shutting down service");
        stop().then(
          () => process.exit(0),
          (err: unknown) => {
            logger.error(
              { service: serviceName, err: errorFields(err) },
              "shutdown failed"
            );
            process.exit(1);
          }
        );
        // Fail-safe in case close hangs
        setTimeout(() => process.exit(1), 10_000).unref();
      };

      process.once("SIGTERM", () => shutdown("SIGTERM"));
      process.once("SIGINT", () => shutdown("SIGINT"));

      resolve({ server, boundPort, stop });
    });
  });
}
