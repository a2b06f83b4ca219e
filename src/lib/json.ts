// Narrowing helpers for provider JSON, which arrives as `unknown`.

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown): JsonRecord {
  return isRecord(value) ? value : {};
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export function asRecords(value: unknown): JsonRecord[] {
  return asArray(value).filter(isRecord);
}

export function readString(obj: JsonRecord, key: string): string | null {
  const value = obj[key];
  if (typeof value === "string" && value.trim().length > 0) return value.trim();
  return null;
}

export function readNumber(obj: JsonRecord, key: string): number | null {
  const value = obj[key];
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}
