// backend/services/shared/src/http/errors.ts
import type { Response } from "express";
import type { ZodIssue } from "zod";

export type ProblemJson = {
  type: string;
  title: string;
  status: number;
  code?: string;
  detail?: string;
  instance?: string;
  errors?: ProblemIssue[];
};

export type ProblemIssue = { path: string; code: string; message: string };

/** Problem+JSON body with undefined members dropped. */
export function problemBody(
  p: Omit<ProblemJson, "type"> & { type?: string }
): ProblemJson {
  const out: ProblemJson = {
    type: p.type ?? "about:blank",
    title: p.title,
    status: p.status,
  };
  if (p.code !== undefined) out.code = p.code;
  if (p.detail !== undefined) out.detail = p.detail;
  if (p.instance !== undefined) out.instance = p.instance;
  if (p.errors !== undefined) out.errors = p.errors;
  return out;
}

export function issuesFromZod(issues: readonly ZodIssue[]): ProblemIssue[] {
  return issues.map((i) => ({
    path: i.path.join("."),
    code: i.code,
    message: i.message,
  }));
}

export const notFound = (res: Response, detail: string, instance?: string) =>
  res
    .status(404)
    .type("application/problem+json")
    .json(
      problemBody({
        title: "Not Found",
        status: 404,
        code: "NOT_FOUND",
        detail,
        instance,
      })
    );

export const conflict = (res: Response, detail: string, instance?: string) =>
  res
    .status(409)
    .type("application/problem+json")
    .json(
      problemBody({
        title: "Conflict",
        status: 409,
        code: "CONFLICT",
        detail,
        instance,
      })
    );

export const zValidationError = (
  res: Response,
  issues: ProblemIssue[],
  instance?: string
) =>
  res
    .status(400)
    .type("application/problem+json")
    .json(
      problemBody({
        title: "Bad Request",
        status: 400,
        code: "BAD_REQUEST",
        detail: "Validation failed",
        instance,
        errors: issues,
      })
    );
