/**
 * Zod validation middleware.
 *
 * Validates the JSON request body against a Zod schema and exposes the
 * parsed value as `validatedBody`, typed by the schema.
 */

import { createMiddleware } from "hono/factory";
import type { ZodError, ZodTypeAny, z } from "zod";
import { createErrorEnvelope } from "../types/error.js";

export function validateBody<S extends ZodTypeAny>(schema: S) {
  return createMiddleware<{ Variables: { validatedBody: z.output<S> } }>(async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"),
        400,
      );
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request body validation failed", {
          issues: formatZodErrors(result.error),
        }),
        400,
      );
    }

    c.set("validatedBody", result.data);
    await next();
  });
}

function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
