// backend/services/customer/test/renderOutcome.spec.ts
import { describe, it, expect } from "vitest";
import { statusFor } from "../src/http/renderOutcome";
import { makeCustomer } from "./helpers/fixtures";

describe("statusFor", () => {
  it("maps each outcome to its HTTP status", () => {
    expect(statusFor({ kind: "listed", customers: [] })).toBe(200);
    expect(statusFor({ kind: "found", customer: makeCustomer("g") })).toBe(200);
    expect(statusFor({ kind: "updated", guid: "g" })).toBe(200);
    expect(statusFor({ kind: "created", guid: "g" })).toBe(201);
    expect(statusFor({ kind: "deleted", guid: "g" })).toBe(204);
    expect(statusFor({ kind: "badRequest", issues: [] })).toBe(400);
    expect(statusFor({ kind: "notFound", guid: "g" })).toBe(404);
    expect(
      statusFor({ kind: "routeNotFound", method: "GET", path: "/" })
    ).toBe(404);
    expect(statusFor({ kind: "conflict", guid: "g" })).toBe(409);
  });
});
