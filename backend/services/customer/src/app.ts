// backend/services/customer/src/app.ts
/**
 * Assemble the customer service on the shared builder:
 *   requestId → httpLogger → health (open) → customer router (parses bodies
 *   for create/update only) → 404 → Problem+JSON error tail.
 *
 * The store is injected; the app never creates or looks one up.
 */
import type { Express } from "express";
import { createServiceApp } from "@shared/app/createServiceApp";
import type { Logger } from "@shared/utils/logger";
import type { CustomerStore } from "./store/CustomerStore";
import { customerRouter } from "./routes/customerRouter";

export interface CustomerAppDeps {
  store: CustomerStore;
  logger: Logger;
  serviceName?: string;
  bodyLimit?: string;
}

export function createCustomerApp(deps: CustomerAppDeps): Express {
  const { store, logger } = deps;
  const serviceName = deps.serviceName ?? "customer";
  const bodyLimit = deps.bodyLimit ?? "16kb";

  return createServiceApp({
    serviceName,
    logger,
    apiPrefix: "/",
    readiness: async () => ({
      customers: await store.exclusive((all) => all.length),
    }),
    mountRoutes: (api) => {
      api.use(customerRouter({ store, logger, bodyLimit }));
    },
  });
}
