/**
 * Zod schemas for JSON payloads crossing a boundary (storage, HTTP, MCP).
 */
import { z } from 'zod';
import type { JsonObject, JsonValue } from './types.js';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(jsonValueSchema);

/** Parse a stored JSON column. Throws when the text is not JSON or fails the schema. */
export function parseJsonColumn<T>(text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const raw: unknown = JSON.parse(text);
  return schema.parse(raw);
}
