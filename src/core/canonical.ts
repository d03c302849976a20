/**
 * Canonical JSON serialization.
 *
 *   1. Keys sorted lexicographically at every nesting level.
 *   2. `undefined` values omitted.
 *   3. Dates serialized as ISO 8601 UTC strings.
 *   4. Byte arrays serialized as `{ "base64": "..." }`.
 *
 * Used for stored JSON columns and for `--json` CLI output, so identical
 * records always print identically.
 */

export function canonicalJson(value: unknown, indent?: number): string {
  return JSON.stringify(toSortedValue(value), null, indent);
}

function toSortedValue(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (value instanceof Uint8Array) {
    return { base64: Buffer.from(value).toString("base64") };
  }

  if (Array.isArray(value)) {
    return value.map(toSortedValue);
  }

  if (typeof value === "object") {
    const obj = value as Record<string, unknown>;
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(obj).sort()) {
      const v = obj[key];
      if (v !== undefined) {
        sorted[key] = toSortedValue(v);
      }
    }
    return sorted;
  }

  return value;
}
