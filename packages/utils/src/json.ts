/**
 * JSON helpers for values that carry bigint amounts
 *
 * Engine state and events hold reserves and prices as bigint, which
 * JSON.stringify rejects. Bigints are written as decimal strings.
 */

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * Deep copy with bigint → decimal string and undefined fields dropped.
 */
export function toJsonValue(value: unknown): JsonValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "bigint") return value.toString();
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") return value;
  if (value instanceof Error) return { name: value.name, message: value.message };
  if (Array.isArray(value)) return value.map(toJsonValue);
  if (typeof value === "object") {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, field] of Object.entries(value)) {
      if (field !== undefined) out[key] = toJsonValue(field);
    }
    return out;
  }
  return String(value);
}

export function stringifyJson(value: unknown): string {
  return JSON.stringify(toJsonValue(value));
}
