export type JsonRecord = Record<string, unknown>;

export const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const ensureArray = (value: unknown): unknown[] => {
  if (value === null || value === undefined) return [];
  return Array.isArray(value) ? value : [value];
};

export const readRecord = (source: unknown, key: string): JsonRecord | null => {
  if (!isRecord(source)) return null;
  const value = source[key];
  return isRecord(value) ? value : null;
};

export const readArray = (source: unknown, key: string): unknown[] => {
  if (!isRecord(source)) return [];
  const value = source[key];
  return Array.isArray(value) ? value : [];
};

export const readString = (source: unknown, key: string): string | null => {
  if (!isRecord(source)) return null;
  const value = source[key];
  return typeof value === "string" ? value : null;
};

/** Numbers arrive as JSON numbers or numeric strings depending on the feed. */
export const toNumber = (value: unknown): number | null => {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
};

export const readNumber = (source: unknown, key: string): number | null => {
  if (!isRecord(source)) return null;
  return toNumber(source[key]);
};

export const readNumberArray = (source: unknown, key: string): Array<number | null> =>
  readArray(source, key).map((entry) => toNumber(entry));

export const readStringArray = (source: unknown, key: string): Array<string | null> =>
  readArray(source, key).map((entry) => (typeof entry === "string" ? entry : null));
