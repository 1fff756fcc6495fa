/**
 * Bootstrap parameter types.
 */

/**
 * Any value representable in JSON.
 */
export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject

/**
 * A JSON object.
 */
export type JsonObject = { [key: string]: JsonValue }

/**
 * Decoded bootstrap parameters.
 *
 * Two independent Params exist per session: context params (where the run
 * context lives) and messages params (where messages go). Opaque to the
 * session; only the matching loader or writer interprets the keys.
 */
export type Params = Readonly<Record<string, JsonValue>>

/**
 * Check if a value is a plain JSON object (not null, array, or primitive).
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Recursively freeze a value and everything reachable from it.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const child of Object.values(value)) {
      deepFreeze(child)
    }
  }
  return value
}
