// backend/services/customer/test/loadCustomers.spec.ts
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createLogger } from "@shared/utils/logger";
import { loadCustomers } from "../src/store/loadCustomers";
import { makeCustomer } from "./helpers/fixtures";

type Line = { level: number; msg: string; count?: number; file?: string };

let dir: string;
let lines: Line[];

const logger = () =>
  createLogger({
    service: "customer-test",
    level: "debug",
    destination: {
      write(msg: string) {
        lines.push(JSON.parse(msg));
      },
    },
  });

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "customers-"));
  lines = [];
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("loadCustomers", () => {
  it("loads a valid array and logs the count", async () => {
    const file = path.join(dir, "customers.json");
    const data = [makeCustomer("g1"), makeCustomer("g2")];
    fs.writeFileSync(file, JSON.stringify(data));

    await expect(loadCustomers(file, logger())).resolves.toEqual(data);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 30,
      msg: "customer_data_loaded",
      count: 2,
      file,
    });
  });

  it("keeps duplicate guids from the file", async () => {
    const file = path.join(dir, "customers.json");
    fs.writeFileSync(
      file,
      JSON.stringify([makeCustomer("g1"), makeCustomer("g1")])
    );
    await expect(loadCustomers(file, logger())).resolves.toHaveLength(2);
  });

  it("falls back to empty when the file is missing", async () => {
    const file = path.join(dir, "absent.json");
    await expect(loadCustomers(file, logger())).resolves.toEqual([]);
    expect(lines[0]).toMatchObject({
      level: 40,
      msg: "customer_data_unreadable",
    });
  });

  it("falls back to empty on invalid JSON", async () => {
    const file = path.join(dir, "customers.json");
    fs.writeFileSync(file, "[{");
    await expect(loadCustomers(file, logger())).resolves.toEqual([]);
    expect(lines[0]).toMatchObject({ level: 40, msg: "customer_data_not_json" });
  });

  it("falls back to empty when records do not match the schema", async () => {
    const file = path.join(dir, "customers.json");
    fs.writeFileSync(file, JSON.stringify([{ guid: "g1" }]));
    await expect(loadCustomers(file, logger())).resolves.toEqual([]);
    expect(lines[0]).toMatchObject({
      level: 40,
      msg: "customer_data_schema_mismatch",
    });
  });
});
