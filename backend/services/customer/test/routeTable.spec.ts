// backend/services/customer/test/routeTable.spec.ts
import { describe, it, expect } from "vitest";
import {
  CUSTOMER_ROUTES,
  createRouteMatcher,
  matchCustomerRoute,
  type RouteSpec,
} from "../src/routes/routeTable";

const nameOf = (method: string, path: string) =>
  matchCustomerRoute(method, path)?.route.name;

describe("customer route table", () => {
  it("lists item routes ahead of collection routes", () => {
    expect(CUSTOMER_ROUTES.map((r) => r.name)).toEqual([
      "fetch",
      "update",
      "delete",
      "create",
      "list",
    ]);
  });

  it("sends GET /customers/{guid} to fetch, not list", () => {
    const m = matchCustomerRoute("GET", "/customers/abc-123");
    expect(m?.route.name).toBe("fetch");
    expect(m?.params).toEqual({ guid: "abc-123" });
  });

  it("maps each method/path pair to its operation", () => {
    expect(nameOf("GET", "/customers")).toBe("list");
    expect(nameOf("POST", "/customers")).toBe("create");
    expect(nameOf("PUT", "/customers/g1")).toBe("update");
    expect(nameOf("DELETE", "/customers/g1")).toBe("delete");
  });

  it("ignores empty segments", () => {
    expect(nameOf("GET", "/customers/")).toBe("list");
    expect(matchCustomerRoute("GET", "//customers//g1/")?.params).toEqual({
      guid: "g1",
    });
  });

  it("matches nothing for a known path under the wrong method", () => {
    expect(nameOf("POST", "/customers/g1")).toBeUndefined();
    expect(nameOf("PUT", "/customers")).toBeUndefined();
    expect(nameOf("DELETE", "/customers")).toBeUndefined();
    expect(nameOf("PATCH", "/customers/g1")).toBeUndefined();
    expect(nameOf("HEAD", "/customers")).toBeUndefined();
  });

  it("matches nothing for unknown or over-long paths", () => {
    expect(nameOf("GET", "/")).toBeUndefined();
    expect(nameOf("GET", "/clients")).toBeUndefined();
    expect(nameOf("GET", "/Customers")).toBeUndefined();
    expect(nameOf("GET", "/customers/g1/orders")).toBeUndefined();
  });

  it("percent-decodes the guid segment", () => {
    expect(matchCustomerRoute("GET", "/customers/a%20b")?.params).toEqual({
      guid: "a b",
    });
    expect(matchCustomerRoute("GET", "/customers/%E0%A4%A")).toBeUndefined();
  });
});

describe("createRouteMatcher", () => {
  it("lets the first matching entry win", () => {
    const routes: RouteSpec[] = [
      { name: "list", method: "GET", template: "/x/:id", hasBody: false },
      { name: "fetch", method: "GET", template: "/x/:id", hasBody: false },
    ];
    expect(createRouteMatcher(routes)("GET", "/x/1")?.route.name).toBe("list");
  });
});
