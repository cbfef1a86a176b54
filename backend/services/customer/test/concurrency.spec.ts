// backend/services/customer/test/concurrency.spec.ts
import { describe, it, expect } from "vitest";
import { CustomerStore } from "../src/store/CustomerStore";
import {
  createCustomer,
  listCustomers,
  removeCustomer,
} from "../src/operations";
import { makeCustomer, guidsOf } from "./helpers/fixtures";

describe("concurrent operations on one store", () => {
  it("lets exactly one of many racing creates win a guid", async () => {
    const store = new CustomerStore();

    const results = await Promise.all(
      Array.from({ length: 50 }, (_, i) =>
        createCustomer(store, makeCustomer("same", { first_name: `n${i}` }))
      )
    );

    const kinds = results.map((r) => r.kind);
    expect(kinds.filter((k) => k === "created")).toHaveLength(1);
    expect(kinds.filter((k) => k === "conflict")).toHaveLength(49);

    const { customers } = await listCustomers(store);
    expect(customers).toHaveLength(1);
    expect(customers[0].guid).toBe("same");
  });

  it("gives every interleaved list a whole-state snapshot", async () => {
    const store = new CustomerStore();
    const lists: Array<Promise<string[]>> = [];
    const writes: Array<Promise<unknown>> = [];

    for (let i = 0; i < 10; i++) {
      writes.push(createCustomer(store, makeCustomer(`g${i}`)));
      lists.push(listCustomers(store).then((o) => guidsOf(o.customers)));
    }
    await Promise.all(writes);
    const snapshots = await Promise.all(lists);

    // the gate admits callers in arrival order
    snapshots.forEach((snap, i) => {
      expect(snap).toEqual(
        Array.from({ length: i + 1 }, (_, k) => `g${k}`)
      );
    });
  });

  it("sees a racing delete as either fully before or fully after", async () => {
    const store = new CustomerStore(
      Array.from({ length: 5 }, (_, i) => makeCustomer(`g${i}`))
    );

    const [before, deleted, after] = await Promise.all([
      listCustomers(store),
      removeCustomer(store, "g2"),
      listCustomers(store),
    ]);

    expect(deleted.kind).toBe("deleted");
    expect(guidsOf(before.customers)).toEqual(["g0", "g1", "g2", "g3", "g4"]);
    expect(guidsOf(after.customers)).toEqual(["g0", "g1", "g3", "g4"]);
  });

  it("parks a create while another holder keeps the store", async () => {
    const store = new CustomerStore();
    const handle = await store.acquire();

    let done = false;
    const pending = createCustomer(store, makeCustomer("g1")).then((r) => {
      done = true;
      return r;
    });

    await new Promise<void>((r) => setTimeout(r, 10));
    expect(done).toBe(false);
    expect(handle.customers).toHaveLength(0);

    handle.release();
    expect(await pending).toEqual({ kind: "created", guid: "g1" });
  });

  it("double delete under contention yields one deleted and one notFound", async () => {
    const store = new CustomerStore([makeCustomer("g1")]);
    const [a, b] = await Promise.all([
      removeCustomer(store, "g1"),
      removeCustomer(store, "g1"),
    ]);
    expect([a.kind, b.kind].sort()).toEqual(["deleted", "notFound"]);
  });
});
