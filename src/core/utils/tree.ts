// src/core/utils/tree.ts
// Helpers for walking untyped JSON payloads.

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getPath(value: unknown, path: readonly string[]): unknown {
  let current: unknown = value;
  for (const key of path) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

export function recordAt(value: unknown, path: readonly string[]): JsonRecord | undefined {
  const found = getPath(value, path);
  return isRecord(found) ? found : undefined;
}

export function stringAt(value: unknown, path: readonly string[]): string | undefined {
  const found = getPath(value, path);
  if (typeof found === 'string' && found.length > 0) {
    return found;
  }
  if (typeof found === 'number' || typeof found === 'bigint') {
    return String(found);
  }
  return undefined;
}

export function arrayAt(value: unknown, path: readonly string[]): unknown[] {
  const found = getPath(value, path);
  return Array.isArray(found) ? found : [];
}

/**
 * Plain JSON copy of an arbitrary value (class instances lose their
 * prototype, bigint becomes a string, undefined fields are dropped).
 */
export function toPlainRecord(value: unknown): JsonRecord {
  const text = JSON.stringify(value, (_key, field: unknown) =>
    typeof field === 'bigint' ? field.toString() : field
  );
  if (text === undefined) {
    return {};
  }
  const parsed: unknown = JSON.parse(text);
  return isRecord(parsed) ? parsed : { value: parsed };
}
