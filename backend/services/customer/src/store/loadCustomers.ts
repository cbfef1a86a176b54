// backend/services/customer/src/store/loadCustomers.ts
import fsp from "node:fs/promises";
import type { Logger } from "@shared/utils/logger";
import { errorFields } from "@shared/utils/logger";
import { zCustomerList, type Customer } from "../contracts/customer.contract";

/**
 * Initial data set for the store.
 *
 * Any failure to read, parse or validate the file falls back to an empty
 * list with a warning; startup never fails here. Duplicate guids in the file
 * are kept as-is.
 */
export async function loadCustomers(
  file: string,
  logger: Logger
): Promise<Customer[]> {
  const log = logger.child({ component: "loadCustomers", file });

  let text: string;
  try {
    text = await fsp.readFile(file, "utf8");
  } catch (err) {
    log.warn({ err: errorFields(err) }, "customer_data_unreadable");
    return [];
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    log.warn({ err: errorFields(err) }, "customer_data_not_json");
    return [];
  }

  const parsed = zCustomerList.safeParse(json);
  if (!parsed.success) {
    log.warn(
      { issues: parsed.error.issues.length },
      "customer_data_schema_mismatch"
    );
    return [];
  }

  log.info({ count: parsed.data.length }, "customer_data_loaded");
  return parsed.data;
}
