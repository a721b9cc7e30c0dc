import { InvalidDateError } from "../errors.js";

/**
 * Normalize a transcript timestamp into a Date.
 *
 * Transcripts carry ISO 8601 strings; older exports and hand-written
 * fixtures sometimes carry Unix seconds or milliseconds instead.
 */
export function normalizeTimestamp(input: unknown): Date | null {
  if (typeof input === "number") {
    if (!Number.isFinite(input)) return null;
    // Millisecond timestamps after 2001-09-09 are > 1e12; seconds stay below 1e11.
    if (input > 1e12) return new Date(input);
    return new Date(input * 1000);
  }
  if (typeof input === "string") {
    if (!input.trim()) return null;
    const d = new Date(input);
    return isNaN(d.getTime()) ? null : d;
  }
  if (input instanceof Date) {
    return isNaN(input.getTime()) ? null : input;
  }
  return null;
}

/** Inclusive on both ends; an absent bound is open. */
export function isInDateRange(timestamp: Date, from?: Date, to?: Date): boolean {
  if (from && timestamp < from) return false;
  if (to && timestamp > to) return false;
  return true;
}

/**
 * Parse an optional ISO date argument. Missing or blank input is no bound.
 *
 * @throws InvalidDateError if the value is present but does not parse.
 */
export function parseDateOption(value: string | undefined, field = "date"): Date | undefined {
  if (value === undefined || !value.trim()) return undefined;
  const date = normalizeTimestamp(value);
  if (!date) throw new InvalidDateError(field, value);
  return date;
}
