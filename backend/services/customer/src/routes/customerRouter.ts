// backend/services/customer/src/routes/customerRouter.ts
/**
 * Dispatches /customers requests through the ordered route table.
 *
 * Flow per request:
 *   match (method, path) → parse + validate body (create/update) → operation
 *   → render
 *
 * - No match → routeNotFound (bare 404); nothing after this router sees it.
 * - A body that fails validation → badRequest; the store is never touched.
 */
import express, { type Request, type RequestHandler } from "express";
import type { Logger } from "@shared/utils/logger";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { requestIdOf } from "@shared/middleware/requestId";
import { issuesFromZod } from "@shared/http/errors";
import { zCustomer, zCustomerReplace } from "../contracts/customer.contract";
import type { CustomerStore } from "../store/CustomerStore";
import {
  createCustomer,
  fetchCustomer,
  listCustomers,
  removeCustomer,
  updateCustomer,
  type Outcome,
} from "../operations";
import { renderOutcome } from "../http/renderOutcome";
import {
  matchCustomerRoute,
  type RouteMatch,
  type RouteName,
} from "./routeTable";

export interface CustomerRouterDeps {
  store: CustomerStore;
  logger: Logger;
  /** Max JSON body size for create/update, in body-parser notation. */
  bodyLimit: string;
}

type RouteCall = {
  store: CustomerStore;
  params: Record<string, string>;
  body: unknown;
  log: Logger;
};

function guidParam(params: Record<string, string>): string {
  const guid = params.guid;
  if (guid === undefined) {
    throw new Error("route template is missing the :guid segment");
  }
  return guid;
}

const HANDLERS: Record<RouteName, (call: RouteCall) => Promise<Outcome>> = {
  list: ({ store }) => listCustomers(store),

  fetch: ({ store, params }) => fetchCustomer(store, guidParam(params)),

  create: async ({ store, body, log }) => {
    const parsed = zCustomer.safeParse(body);
    if (!parsed.success) {
      return { kind: "badRequest", issues: issuesFromZod(parsed.error.issues) };
    }
    return createCustomer(store, parsed.data, log);
  },

  // Path guid is authoritative: it picks the target and is what gets stored.
  update: async ({ store, params, body, log }) => {
    const parsed = zCustomerReplace.safeParse(body);
    if (!parsed.success) {
      return { kind: "badRequest", issues: issuesFromZod(parsed.error.issues) };
    }
    const { first_name, last_name, email, address } = parsed.data;
    return updateCustomer(
      store,
      { guid: guidParam(params), first_name, last_name, email, address },
      log
    );
  },

  delete: ({ store, params, log }) =>
    removeCustomer(store, guidParam(params), log),
};

/** Resolve a matched request to an outcome without touching the response. */
export async function dispatchCustomerRequest(
  deps: Pick<CustomerRouterDeps, "store" | "logger">,
  match: RouteMatch | undefined,
  req: Pick<Request, "method" | "path" | "body">
): Promise<Outcome> {
  if (!match) {
    return { kind: "routeNotFound", method: req.method, path: req.path };
  }
  return HANDLERS[match.route.name]({
    store: deps.store,
    params: match.params,
    body: match.route.hasBody ? req.body : undefined,
    log: deps.logger,
  });
}

/**
 * The JSON parser runs only once a body-bearing route has matched; a body on
 * any other request is never read.
 */
export function customerRouter(deps: CustomerRouterDeps): RequestHandler {
  const log = deps.logger.child({ component: "customerRouter" });
  const parseJson = express.json({ limit: deps.bodyLimit });

  const dispatch = (match: RouteMatch | undefined) =>
    asyncHandler(async (req, res) => {
      const outcome = await dispatchCustomerRequest(
        { store: deps.store, logger: log },
        match,
        req
      );
      log.debug(
        {
          reqId: requestIdOf(req),
          method: req.method,
          path: req.path,
          outcome: outcome.kind,
        },
        "customer_dispatch"
      );
      renderOutcome(res, outcome, requestIdOf(req));
    });

  return (req, res, next) => {
    const match = matchCustomerRoute(req.method, req.path);
    const handle = dispatch(match);
    if (!match?.route.hasBody) return handle(req, res, next);

    parseJson(req, res, (err?: unknown) => {
      if (err) return next(err);
      handle(req, res, next);
    });
  };
}
