// backend/services/customer/src/operations/fetch.ts
import { copyCustomer } from "../contracts/customer.contract";
import type { CustomerStore } from "../store/CustomerStore";
import type { Outcome } from "./outcome";

export async function fetchCustomer(
  store: CustomerStore,
  guid: string
): Promise<Extract<Outcome, { kind: "found" | "notFound" }>> {
  const hit = await store.exclusive((all) => {
    const match = all.find((c) => c.guid === guid);
    return match ? copyCustomer(match) : undefined;
  });
  return hit ? { kind: "found", customer: hit } : { kind: "notFound", guid };
}
