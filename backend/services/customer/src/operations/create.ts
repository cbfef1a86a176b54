// backend/services/customer/src/operations/create.ts
import type { Logger } from "@shared/utils/logger";
import { copyCustomer, type Customer } from "../contracts/customer.contract";
import type { CustomerStore } from "../store/CustomerStore";
import type { Outcome } from "./outcome";

/**
 * Append a new customer unless its guid is already present.
 * The uniqueness scan and the append share one guarded section.
 */
export async function createCustomer(
  store: CustomerStore,
  candidate: Customer,
  log?: Logger
): Promise<Extract<Outcome, { kind: "created" | "conflict" }>> {
  const { guid } = candidate;
  const inserted = await store.exclusive((all) => {
    if (all.some((c) => c.guid === guid)) return false;
    all.push(copyCustomer(candidate));
    return true;
  });

  if (!inserted) {
    log?.debug({ guid }, "customer_create_conflict");
    return { kind: "conflict", guid };
  }
  return { kind: "created", guid };
}
