// Readers for untyped provider JSON. Each returns undefined instead of throwing
// so transformers decide what a missing field means.

export type JsonObject = Record<string, unknown>;

export function asObject(value: unknown): JsonObject | undefined {
  return typeof value === "object" && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : undefined;
}

export function readObject(obj: JsonObject | undefined, key: string): JsonObject | undefined {
  return asObject(obj?.[key]);
}

export function readString(obj: JsonObject | undefined, key: string): string | undefined {
  const value = obj?.[key];
  return typeof value === "string" ? value : undefined;
}

export function readNumber(obj: JsonObject | undefined, key: string): number | undefined {
  const value = obj?.[key];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

export function readArray(obj: JsonObject | undefined, key: string): unknown[] | undefined {
  const value = obj?.[key];
  return Array.isArray(value) ? value : undefined;
}

export function readObjects(obj: JsonObject | undefined, key: string): JsonObject[] {
  return (readArray(obj, key) ?? []).flatMap((item) => {
    const o = asObject(item);
    return o ? [o] : [];
  });
}

export function readStrings(obj: JsonObject | undefined, key: string): string[] | undefined {
  const arr = readArray(obj, key);
  if (!arr) return undefined;
  return arr.filter((s): s is string => typeof s === "string");
}

export function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((n) => typeof n === "number");
}

/** Parses a JSON string, returning undefined for invalid input. */
export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch (err) {
    if (err instanceof SyntaxError) return undefined;
    throw err;
  }
}
