// backend/services/customer/src/contracts/customer.contract.ts
/**
 * Wire contract for a customer record.
 *
 * - Exactly five string fields. Unknown keys are stripped on parse; a missing
 *   or non-string field fails the parse.
 * - No format checks (email, address): any string is accepted, including "".
 */
import { z } from "zod";

export const zCustomer = z.object({
  guid: z.string(),
  first_name: z.string(),
  last_name: z.string(),
  email: z.string(),
  address: z.string(),
});

export type Customer = z.infer<typeof zCustomer>;

export const zCustomerList = z.array(zCustomer);

/** PUT body: the path names the target, so guid may be omitted. */
export const zCustomerReplace = zCustomer.extend({
  guid: z.string().optional(),
});

export function copyCustomer(c: Customer): Customer {
  return {
    guid: c.guid,
    first_name: c.first_name,
    last_name: c.last_name,
    email: c.email,
    address: c.address,
  };
}
