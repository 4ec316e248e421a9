import type { Context } from "hono";
import type { z } from "zod";
import { validation } from "./errors";

/** Parse `input` or throw a validation AppError naming each failing field */
export function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
      .join("; ");
    throw validation(message);
  }
  return parsed.data;
}

export async function readJsonBody<T extends z.ZodTypeAny>(
  c: Context,
  schema: T
): Promise<z.output<T>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw validation("Request body must be valid JSON");
  }
  return parseWith(schema, body);
}
