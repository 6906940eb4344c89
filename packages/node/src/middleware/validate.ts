/**
 * Zod validation middleware.
 *
 * Validates the JSON request body against a Zod schema and exposes the
 * parsed value as `validatedBody`, typed by the schema's output.
 */

import { createMiddleware } from "hono/factory";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import { apiError } from "../types/error.js";

export interface ValidatedEnv<T> {
  Variables: {
    validatedBody: T;
  };
}

/**
 * On failure, returns 400 with structured validation issues.
 */
export function validateBody<T>(schema: ZodType<T, ZodTypeDef, unknown>) {
  return createMiddleware<ValidatedEnv<T>>(async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return apiError(c, "VALIDATION_ERROR", "Invalid JSON in request body");
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return apiError(c, "VALIDATION_ERROR", "Request body validation failed", {
        issues: formatZodErrors(result.error),
      });
    }

    c.set("validatedBody", result.data);
    await next();
  });
}

export function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
