// ---------------------------------------------------------------------------
// Request validation helpers shared by the route modules.
// ---------------------------------------------------------------------------

import type { Context } from "hono";
import { z } from "zod";

import { ValidationError } from "../core/errors.js";
import type { AppEnv } from "./env.js";

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
}

/** Parse `value` against `schema`, throwing `ValidationError` with one line per issue. */
export function validate<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`invalid ${what}`, issuesOf(result.error));
  }
  return result.data;
}

/** Read and validate a JSON request body. */
export async function readJsonBody<S extends z.ZodTypeAny>(
  c: Context<AppEnv>,
  schema: S,
): Promise<z.output<S>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new ValidationError("request body must be valid JSON");
  }
  return validate(schema, body, "request body");
}

/** Validate the query string as a flat record. */
export function readQuery<S extends z.ZodTypeAny>(c: Context<AppEnv>, schema: S): z.output<S> {
  return validate(schema, c.req.query(), "query parameters");
}

export const IdParam = z.string().min(1).max(128);
