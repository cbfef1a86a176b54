// backend/services/customer/src/operations/update.ts
import type { Logger } from "@shared/utils/logger";
import { copyCustomer, type Customer } from "../contracts/customer.contract";
import type { CustomerStore } from "../store/CustomerStore";
import type { Outcome } from "./outcome";

/**
 * Full replace of the first customer whose guid matches `updated.guid`.
 * Position and guid are kept; every other field comes from `updated`.
 */
export async function updateCustomer(
  store: CustomerStore,
  updated: Customer,
  log?: Logger
): Promise<Extract<Outcome, { kind: "updated" | "notFound" }>> {
  const { guid } = updated;
  const replaced = await store.exclusive((all) => {
    const idx = all.findIndex((c) => c.guid === guid);
    if (idx === -1) return false;
    all[idx] = copyCustomer(updated);
    return true;
  });

  if (!replaced) {
    log?.debug({ guid }, "customer_update_miss");
    return { kind: "notFound", guid };
  }
  return { kind: "updated", guid };
}
