// backend/services/customer/src/store/CustomerStore.ts
/**
 * The single in-memory collection of customers plus its access guard.
 *
 * Invariants:
 * - One instance per process, injected into every operation.
 * - The backing array is reachable only through an exclusive handle; no
 *   caller ever sees it outside a guarded section.
 * - Insertion order is the only order.
 */
import { ExclusiveGate } from "@shared/sync/ExclusiveGate";
import { copyCustomer, type Customer } from "../contracts/customer.contract";

export interface StoreHandle {
  /** Live backing array; valid only until release(). */
  readonly customers: Customer[];
  release(): void;
}

export class CustomerStore {
  readonly #customers: Customer[];
  readonly #gate = new ExclusiveGate();

  constructor(initial: readonly Customer[] = []) {
    this.#customers = initial.map(copyCustomer);
  }

  /**
   * Wait until no other holder is active, then hand out the collection.
   * Prefer exclusive(), which releases on every exit path.
   */
  public async acquire(): Promise<StoreHandle> {
    const lease = await this.#gate.acquire();
    const customers = this.#customers;
    let open = true;
    return {
      get customers(): Customer[] {
        if (!open) throw new Error("CustomerStore handle used after release");
        return customers;
      },
      release: () => {
        open = false;
        lease.release();
      },
    };
  }

  /** Scoped acquisition: run fn with the collection, release afterwards. */
  public exclusive<T>(
    fn: (customers: Customer[]) => T | Promise<T>
  ): Promise<T> {
    return this.#gate.run(() => fn(this.#customers));
  }
}
