/**
 * Generic JSON value type and a guarded accessor for traversing untyped
 * response bodies. Reads return `undefined` when the key is absent or holds a
 * different shape.
 *
 * @module types/json
 */

export type JsonPrimitive = string | number | boolean | null

export type JsonObject = { [key: string]: JsonValue }

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Read `value[key]` as an object. */
export function getObject(value: unknown, key: string): JsonObject | undefined {
  if (!isJsonObject(value)) return undefined
  const child = value[key]
  return isJsonObject(child) ? child : undefined
}
