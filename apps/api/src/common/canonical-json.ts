export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

function sortKeys(value: JsonValue): JsonValue {
  if (value === null || typeof value !== "object") {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }

  const sorted: { [key: string]: JsonValue } = {};
  for (const key of Object.keys(value).sort()) {
    sorted[key] = sortKeys(value[key]);
  }
  return sorted;
}

/** Compact JSON with recursively sorted object keys. Array order is kept. */
export function canonicalJson(value: JsonValue): string {
  return JSON.stringify(sortKeys(value));
}

export function encodeCanonicalBase64(value: JsonValue): string {
  return Buffer.from(canonicalJson(value), "utf-8").toString("base64");
}
