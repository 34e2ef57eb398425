import { z } from "zod";

/**
 * Recursive JSON value used for feed payloads, enrichment data and user metadata.
 */
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
    [key: string]: JsonValue;
}

const jsonPrimitiveSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
    z.union([jsonPrimitiveSchema, z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(jsonValueSchema);

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Converts an arbitrary value into its JSON representation, dropping
 * anything JSON cannot carry (undefined, functions, symbols).
 */
export function toJsonObject(value: unknown): JsonObject {
    const serialized = JSON.stringify(value ?? {});
    const result = jsonObjectSchema.safeParse(JSON.parse(serialized));
    return result.success ? result.data : {};
}
