// backend/services/customer/src/operations/outcome.ts
import type { ProblemIssue } from "@shared/http/errors";
import type { Customer } from "../contracts/customer.contract";

/**
 * Every way a customer request can end. Operations return one of these;
 * renderOutcome() is the only place that turns them into HTTP.
 */
export type Outcome =
  | { kind: "listed"; customers: Customer[] }
  | { kind: "found"; customer: Customer }
  | { kind: "created"; guid: string }
  | { kind: "updated"; guid: string }
  | { kind: "deleted"; guid: string }
  | { kind: "conflict"; guid: string }
  | { kind: "notFound"; guid: string }
  | { kind: "badRequest"; issues: ProblemIssue[] }
  | { kind: "routeNotFound"; method: string; path: string };

