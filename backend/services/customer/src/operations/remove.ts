// backend/services/customer/src/operations/remove.ts
import type { Logger } from "@shared/utils/logger";
import type { CustomerStore } from "../store/CustomerStore";
import type { Outcome } from "./outcome";

/**
 * Drop every customer with this guid in one guarded pass, compacting in
 * place so survivors keep their relative order. No separate lookup first.
 */
export async function removeCustomer(
  store: CustomerStore,
  guid: string,
  log?: Logger
): Promise<Extract<Outcome, { kind: "deleted" | "notFound" }>> {
  const removed = await store.exclusive((all) => {
    const before = all.length;
    let kept = 0;
    for (let i = 0; i < before; i++) {
      const c = all[i];
      if (c.guid !== guid) all[kept++] = c;
    }
    all.length = kept;
    return before - kept;
  });

  if (removed === 0) {
    log?.debug({ guid }, "customer_delete_miss");
    return { kind: "notFound", guid };
  }
  return { kind: "deleted", guid };
}
