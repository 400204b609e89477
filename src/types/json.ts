import { z } from 'zod';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

const primitiveSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const jsonSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([primitiveSchema, z.array(jsonSchema), z.record(jsonSchema)])
);

export const isJsonObject = (value: JsonValue | undefined): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const asString = (value: JsonValue | undefined, fallback = ''): string =>
  typeof value === 'string' ? value : fallback;

// Two-space indent; Hebrew is written literally, not as \u escapes.
export const toJsonText = (value: unknown) => JSON.stringify(value, null, 2);
