import type { Context } from 'hono'
import type { z } from 'zod'

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>

function validationError(c: Context, error: z.ZodError): Response {
  return c.json({ error: 'Validation failed.', fields: error.flatten().fieldErrors }, 400)
}

/** Validate already-extracted input (path params, query). Returns 400 on failure. */
export function parseInput<T>(c: Context, schema: Schema<T>, input: unknown): T | Response {
  const result = schema.safeParse(input)
  return result.success ? result.data : validationError(c, result.error)
}

/** Parse and validate request body with a Zod schema. Returns 400 on failure. */
export async function parseBody<T>(c: Context, schema: Schema<T>): Promise<T | Response> {
  let body: unknown
  try {
    body = await c.req.json()
  } catch {
    return c.json({ error: 'Invalid JSON body.' }, 400)
  }
  return parseInput(c, schema, body)
}

/** Check if a parse result is a Response (validation error). */
export function isResponse(value: unknown): value is Response {
  return value instanceof Response
}
