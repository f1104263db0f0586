/** Scalar JSON value. */
export type JsonPrimitive = string | number | boolean | null;

/** JSON object, keyed by property name. */
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Any value `JSON.parse` can produce. Gateway payloads are returned as this type,
 * without per-endpoint shapes.
 */
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
