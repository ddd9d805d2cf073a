import { format, isValid, parse } from "date-fns";
import type { DateKey } from "../../types/models.js";

const DATE_KEY_FORMAT = "yyyy-MM-dd";

/**
 * Format a Date as its calendar day in the host timezone
 */
export function toDateKey(date: Date): DateKey {
  return format(date, DATE_KEY_FORMAT);
}

/**
 * Parse a yyyy-MM-dd key into a local-midnight Date, or null if malformed
 */
export function parseDateKey(key: string): Date | null {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(key)) return null;
  const parsed = parse(key, DATE_KEY_FORMAT, new Date(0));
  if (!isValid(parsed) || format(parsed, DATE_KEY_FORMAT) !== key) return null;
  return parsed;
}

export function nowIso(): string {
  return new Date().toISOString();
}
