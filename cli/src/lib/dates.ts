import * as chrono from "chrono-node";

// 2024-01-01, 2024-01-01T10:00, 2024-01-01 10:00:00.123+02:00, ...
const ISO_LIKE = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:\d{2})?)?$/i;

/**
 * Best-effort date parsing: ISO-8601 forms first (a bare date is midnight UTC,
 * a date-time without offset is local time), then natural language such as
 * "yesterday 14:00" or "2 hours ago" relative to `reference`.
 */
export function parseDateTime(input: string, reference: Date = new Date()): Date | null {
  const text = input.trim();
  if (!text) return null;

  if (ISO_LIKE.test(text)) {
    const parsed = new Date(text.replace(" ", "T"));
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }

  return chrono.parseDate(text, reference);
}

/** Formats a parsed date the way range clauses expect it. */
export function toRfc3339(date: Date): string {
  return date.toISOString();
}
