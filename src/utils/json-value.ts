export type JsonValueT =
  | string
  | number
  | boolean
  | null
  | JsonValueT[]
  | { [key: string]: JsonValueT };

/**
 * Convert decoded bus values into something JSON.stringify accepts.
 *
 * 64-bit integers arrive as bigint; they become numbers when safe and
 * decimal strings otherwise. Byte arrays become base64.
 */
export function toJsonValue(value: unknown): JsonValueT {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "bigint") {
    const asNumber = Number(value);
    return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
  }
  if (Buffer.isBuffer(value)) {
    return value.toString("base64");
  }
  if (Array.isArray(value)) {
    return value.map(toJsonValue);
  }
  if (typeof value === "object") {
    return toJsonObject(value);
  }
  return String(value);
}

/**
 * toJsonValue for a property bag
 */
export function toJsonObject(value: object): { [key: string]: JsonValueT } {
  const result: { [key: string]: JsonValueT } = {};
  for (const [key, entry] of Object.entries(value)) {
    result[key] = toJsonValue(entry);
  }
  return result;
}
