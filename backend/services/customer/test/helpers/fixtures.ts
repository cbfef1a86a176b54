// backend/services/customer/test/helpers/fixtures.ts
import type { Customer } from "../../src/contracts/customer.contract";

export function makeCustomer(
  guid: string,
  overrides: Partial<Omit<Customer, "guid">> = {}
): Customer {
  return {
    guid,
    first_name: "A",
    last_name: "B",
    email: "a@b.com",
    address: "X",
    ...overrides,
  };
}

export const guidsOf = (list: Customer[]) => list.map((c) => c.guid);
