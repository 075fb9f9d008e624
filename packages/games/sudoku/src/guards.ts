export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** 1-9 */
export function isDigit(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 1 && value <= 9;
}

/** 0-9, where 0 is an empty cell */
export function isCellValue(value: unknown): value is number {
  return value === 0 || isDigit(value);
}
