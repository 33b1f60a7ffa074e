import type { RecordId } from "@/types";

const NUMERIC_ID = /^\d+$/;

/**
 * Ascending identifier order: numeric ids by value, before any non-numeric key.
 * Ids are compared as strings so values beyond the safe integer range still order correctly.
 */
export function compareRecordIds(a: RecordId, b: RecordId): number {
  const aNumeric = NUMERIC_ID.test(a);
  const bNumeric = NUMERIC_ID.test(b);
  if (aNumeric && bNumeric) {
    const aDigits = a.replace(/^0+(?=\d)/, "");
    const bDigits = b.replace(/^0+(?=\d)/, "");
    if (aDigits.length !== bDigits.length) return aDigits.length - bDigits.length;
    return aDigits < bDigits ? -1 : aDigits > bDigits ? 1 : 0;
  }
  if (aNumeric !== bNumeric) return aNumeric ? -1 : 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Filename safe to join under a directory: no separators, no control characters
 */
export function sanitizeFilename(filename: string, fallback: string): string {
  const cleaned = filename.replace(/[\\/\u0000-\u001f]/g, "_").trim();
  if (cleaned === "" || cleaned === "." || cleaned === "..") return fallback;
  return cleaned;
}
