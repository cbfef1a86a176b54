// backend/services/customer/src/operations/list.ts
import { copyCustomer } from "../contracts/customer.contract";
import type { CustomerStore } from "../store/CustomerStore";
import type { Outcome } from "./outcome";

/** Point-in-time copy of the whole collection, in insertion order. */
export async function listCustomers(
  store: CustomerStore
): Promise<Extract<Outcome, { kind: "listed" }>> {
  const customers = await store.exclusive((all) => all.map(copyCustomer));
  return { kind: "listed", customers };
}
