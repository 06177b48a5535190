/**
 * Zod validation middleware.
 *
 * Validates the JSON body against a Zod schema and exposes the parsed
 * value as `c.req.valid("json")`. Returns 400 with an error envelope on
 * validation failure.
 */

import { validator } from "hono/validator";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import { createErrorEnvelope } from "../types/error.js";

export function validateBody<T>(schema: ZodType<T, ZodTypeDef, unknown>) {
  return validator("json", (value, c) => {
    const result = schema.safeParse(value);
    if (!result.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request body validation failed", {
          issues: formatZodErrors(result.error),
        }),
        400,
      );
    }
    return result.data;
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
