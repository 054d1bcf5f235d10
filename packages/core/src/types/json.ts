/**
 * JSON value types and guards
 * Used at the boundary where response bodies enter the client.
 */

/**
 * Any value JSON.parse can produce
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Check if value is a JSON object (not null, not array)
 */
export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isJsonArray(value: JsonValue | undefined): value is JsonValue[] {
  return Array.isArray(value);
}

/**
 * Read a nested field by key path; undefined as soon as a step is missing
 */
export function getPath(value: JsonValue, ...path: ReadonlyArray<string | number>): JsonValue | undefined {
  let current: JsonValue | undefined = value;
  for (const key of path) {
    if (typeof key === 'number') {
      current = isJsonArray(current) ? current[key] : undefined;
    } else {
      current = isJsonObject(current) ? current[key] : undefined;
    }
    if (current === undefined) return undefined;
  }
  return current;
}

/**
 * Render a value as indented JSON (two spaces)
 */
export function toPrettyJson(value: JsonValue): string {
  return JSON.stringify(value, null, 2);
}
