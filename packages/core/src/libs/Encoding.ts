/**
 * Canonical JSON encoding for exported assignment logs.
 * Object keys are sorted alphabetically, Maps become sorted-key objects,
 * undefined values are dropped. Output is byte-identical for equal inputs.
 */
export function canonicalEncode(obj: unknown, indent?: number): string {
  return JSON.stringify(
    obj,
    (_, value: unknown) => {
      if (value instanceof Map) {
        return sortKeys(Object.fromEntries(value));
      }
      if (isPlainObject(value)) {
        return sortKeys(value);
      }
      return value;
    },
    indent
  );
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function sortKeys(value: Record<string, unknown>): Record<string, unknown> {
  return Object.keys(value)
    .sort()
    .reduce<Record<string, unknown>>((sorted, key) => {
      if (value[key] !== undefined) {
        sorted[key] = value[key];
      }
      return sorted;
    }, {});
}
