import { format, isValid, parse } from "date-fns";

/** UTC calendar date of an epoch in milliseconds. */
export function epochToIsoDate(epochMs: number | undefined | null): string | null {
  if (epochMs === undefined || epochMs === null) return null;
  const date = new Date(epochMs);
  return Number.isNaN(date.getTime()) ? null : date.toISOString().slice(0, 10);
}

/**
 * PGN date ("2024.03.05") to ISO. Partial dates such as "2024.??.??" and
 * impossible ones count as absent.
 */
export function pgnDateToIso(value: string | undefined | null): string | null {
  const trimmed = value?.trim() ?? "";
  if (!/^\d{4}\.\d{2}\.\d{2}$/.test(trimmed)) return null;

  const date = parse(trimmed, "yyyy.MM.dd", new Date());
  return isValid(date) ? format(date, "yyyy-MM-dd") : null;
}
