/**
 * Zod request validation.
 *
 * Failures throw RequestValidationError, which the error handler turns
 * into a 400 envelope with the individual issues.
 */

import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import { RequestValidationError } from "../types/error.js";

/**
 * Parse and validate the JSON request body.
 */
export async function validateBody<T>(
  c: Context,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch (err) {
    throw new RequestValidationError("Invalid JSON in request body", undefined, { cause: err });
  }
  return check(schema, body, "Request body validation failed");
}

/**
 * Validate the query string.
 */
export function validateQuery<T>(c: Context, schema: ZodType<T, ZodTypeDef, unknown>): T {
  return check(schema, c.req.query(), "Invalid query parameters");
}

function check<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown, message: string): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new RequestValidationError(message, { issues: formatZodErrors(result.error) });
  }
  return result.data;
}

function formatZodErrors(error: ZodError): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
