/**
 * Coercion of raw property text into typed scalar values
 */

import { EXPORT_DATE_PATTERN } from "@/constants/conversion.constants";
import type { JsonScalar, JsonValue, ScalarValue } from "@/types";

const INTEGER_PATTERN = /^-?\d+$/;

const DATE_TAGS = new Set(["date", "timestamp", "datetime", "java.util.date", "java.sql.timestamp"]);
const INTEGER_TAGS = new Set(["int", "integer", "long", "short", "java.lang.integer", "java.lang.long", "java.lang.short"]);
const BOOLEAN_TAGS = new Set(["boolean", "bool", "java.lang.boolean"]);

/**
 * Parse the export's fixed date-time representation, read as UTC
 */
export function parseExportDate(value: string): Date | null {
  const match = value.trim().match(EXPORT_DATE_PATTERN);
  if (!match) return null;

  const [, year, month, day, hour, minute, second, fraction] = match;
  const date = new Date(
    Date.UTC(
      Number(year),
      Number(month) - 1,
      Number(day),
      Number(hour),
      Number(minute),
      Number(second),
      fraction ? Number(fraction.padEnd(3, "0")) : 0,
    ),
  );
  return isNaN(date.getTime()) ? null : date;
}

export function parseInteger(value: string): number | null {
  const trimmed = value.trim();
  if (!INTEGER_PATTERN.test(trimmed)) return null;
  const parsed = Number(trimmed);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

/**
 * Coerce property text according to its type tag. Untagged and unknown tags stay raw strings.
 */
export function coerceScalar(raw: string | null, tag?: string): ScalarValue {
  if (raw === null) return null;
  if (!tag) return raw;

  const normalizedTag = tag.toLowerCase();

  if (DATE_TAGS.has(normalizedTag)) {
    return parseExportDate(raw) ?? raw;
  }
  if (INTEGER_TAGS.has(normalizedTag)) {
    return parseInteger(raw) ?? raw;
  }
  if (BOOLEAN_TAGS.has(normalizedTag)) {
    const lowered = raw.trim().toLowerCase();
    return lowered === "true" ? true : lowered === "false" ? false : raw;
  }
  return raw;
}

export function scalarToString(value: ScalarValue | undefined): string | null {
  if (value === undefined || value === null) return null;
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

export function scalarToInteger(value: ScalarValue | undefined): number | null {
  if (typeof value === "number") return Number.isSafeInteger(value) ? value : null;
  if (typeof value === "string") return parseInteger(value);
  return null;
}

export function scalarToTimestamp(value: ScalarValue | undefined): string | null {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string") return parseExportDate(value)?.toISOString() ?? null;
  return null;
}

export function scalarToJson(value: ScalarValue): JsonScalar {
  return value instanceof Date ? value.toISOString() : value;
}

/**
 * Content property strings holding a JSON object or array become that structure
 */
export function decodeStructuredValue(value: string): JsonValue {
  const trimmed = value.trim();
  if (!(trimmed.startsWith("{") || trimmed.startsWith("["))) return value;
  try {
    return toJsonValue(JSON.parse(trimmed)) ?? value;
  } catch {
    return value;
  }
}

function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (Array.isArray(value)) {
    const items: JsonValue[] = [];
    for (const item of value) {
      const converted = toJsonValue(item);
      if (converted === undefined) return undefined;
      items.push(converted);
    }
    return items;
  }
  if (typeof value === "object") {
    const result: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      const converted = toJsonValue(item);
      if (converted === undefined) return undefined;
      result[key] = converted;
    }
    return result;
  }
  return undefined;
}
