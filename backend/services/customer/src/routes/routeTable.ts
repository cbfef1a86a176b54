// backend/services/customer/src/routes/routeTable.ts
/**
 * Ordered route table for the customer service.
 *
 * Precedence is part of the contract: entries are tried top to bottom and the
 * first whose method AND template both match wins. Item routes sit above the
 * collection routes so `/customers` can never claim `/customers/{guid}`.
 * A path that matches a template under a different method matches nothing.
 */

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export type RouteName = "fetch" | "update" | "delete" | "create" | "list";

export interface RouteSpec {
  name: RouteName;
  method: HttpMethod;
  /** Slash-separated segments; `:name` captures one segment. */
  template: string;
  /** Route carries a customer JSON body that must validate first. */
  hasBody: boolean;
}

export const CUSTOMER_ROUTES: readonly RouteSpec[] = [
  { name: "fetch", method: "GET", template: "/customers/:guid", hasBody: false },
  { name: "update", method: "PUT", template: "/customers/:guid", hasBody: true },
  {
    name: "delete",
    method: "DELETE",
    template: "/customers/:guid",
    hasBody: false,
  },
  { name: "create", method: "POST", template: "/customers", hasBody: true },
  { name: "list", method: "GET", template: "/customers", hasBody: false },
];

type Segment = { literal: string } | { param: string };

export interface RouteMatch {
  route: RouteSpec;
  params: Record<string, string>;
}

function segmentsOf(path: string): string[] {
  return path.split("/").filter((s) => s !== "");
}

function compile(template: string): Segment[] {
  return segmentsOf(template).map((s) =>
    s.startsWith(":") ? { param: s.slice(1) } : { literal: s }
  );
}

function decodeSegment(raw: string): string | undefined {
  try {
    return decodeURIComponent(raw);
  } catch {
    // malformed percent-encoding: the segment matches no template
    return undefined;
  }
}

function matchTemplate(
  compiled: Segment[],
  parts: string[]
): Record<string, string> | undefined {
  if (compiled.length !== parts.length) return undefined;
  const params: Record<string, string> = {};
  for (let i = 0; i < compiled.length; i++) {
    const seg = compiled[i];
    const part = parts[i];
    if ("literal" in seg) {
      if (seg.literal !== part) return undefined;
      continue;
    }
    const decoded = decodeSegment(part);
    if (decoded === undefined) return undefined;
    params[seg.param] = decoded;
  }
  return params;
}

/**
 * Builds a matcher over `routes`, preserving their order. Empty segments are
 * ignored, so `/customers/` is `/customers`.
 */
export function createRouteMatcher(routes: readonly RouteSpec[]) {
  const compiled = routes.map((route) => ({
    route,
    segments: compile(route.template),
  }));

  return function matchRoute(
    method: string,
    path: string
  ): RouteMatch | undefined {
    const parts = segmentsOf(path);
    for (const { route, segments } of compiled) {
      if (route.method !== method) continue;
      const params = matchTemplate(segments, parts);
      if (params) return { route, params };
    }
    return undefined;
  };
}

export const matchCustomerRoute = createRouteMatcher(CUSTOMER_ROUTES);
