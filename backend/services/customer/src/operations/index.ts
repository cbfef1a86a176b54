// backend/services/customer/src/operations/index.ts
export { listCustomers } from "./list";
export { createCustomer } from "./create";
export { fetchCustomer } from "./fetch";
export { updateCustomer } from "./update";
export { removeCustomer } from "./remove";
export type { Outcome } from "./outcome";
