// backend/services/customer/index.ts
/**
 * Start-up, in order: env cascade → config → logger → initial records →
 * the one CustomerStore → app → listen.
 */
import path from "node:path";
import { loadServiceEnv, SERVICE_DIR } from "./src/bootstrap";
import { loadConfig } from "./src/config";
import { createLogger, errorFields } from "@shared/utils/logger";
import { startHttpService } from "@shared/bootstrap/startHttpService";
import { CustomerStore } from "./src/store/CustomerStore";
import { loadCustomers } from "./src/store/loadCustomers";
import { createCustomerApp } from "./src/app";

async function start(): Promise<void> {
  const envFiles = loadServiceEnv();
  const config = loadConfig();
  const logger = createLogger({
    service: config.serviceName,
    level: config.logLevel,
  });
  logger.debug({ files: envFiles }, "env_loaded");

  process.on("unhandledRejection", (reason) => {
    logger.error({ reason: errorFields(reason) }, "unhandled_rejection");
  });
  process.on("uncaughtException", (err) => {
    logger.error({ err: errorFields(err) }, "uncaught_exception");
  });

  // Relative data paths are taken from the service directory.
  const dataFile = path.resolve(SERVICE_DIR, config.dataFile);
  const store = new CustomerStore(await loadCustomers(dataFile, logger));
  const app = createCustomerApp({
    store,
    logger,
    serviceName: config.serviceName,
    bodyLimit: config.bodyLimit,
  });

  await startHttpService({
    app,
    host: config.host,
    port: config.port,
    serviceName: config.serviceName,
    logger,
  });
}

start().catch((err: unknown) => {
  // Logger may not exist yet (bad config); stderr is the only sink left.
  console.error("[customer] failed to start:", errorFields(err));
  process.exit(1);
});
