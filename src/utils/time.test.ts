import { describe, it, expect } from "vitest";
import { normalizeTimestamp, isInDateRange, parseDateOption } from "./time.js";
import { InvalidDateError } from "../errors.js";

describe("normalizeTimestamp", () => {
  it("handles ISO 8601 strings", () => {
    const result = normalizeTimestamp("2025-03-01T10:00:00Z");
    expect(result?.toISOString()).toBe("2025-03-01T10:00:00.000Z");
  });

  it("handles Unix milliseconds", () => {
    expect(normalizeTimestamp(1738368000000)?.toISOString()).toBe("2025-02-01T00:00:00.000Z");
  });

  it("handles Unix seconds", () => {
    expect(normalizeTimestamp(1738368000)?.toISOString()).toBe("2025-02-01T00:00:00.000Z");
  });

  it("passes through valid Date objects", () => {
    const input = new Date("2025-02-01T00:00:00Z");
    expect(normalizeTimestamp(input)).toBe(input);
  });

  it("rejects invalid Date objects", () => {
    expect(normalizeTimestamp(new Date("nope"))).toBeNull();
  });

  it("returns null for missing values", () => {
    expect(normalizeTimestamp(null)).toBeNull();
    expect(normalizeTimestamp(undefined)).toBeNull();
  });

  it("returns null for blank and unparseable strings", () => {
    expect(normalizeTimestamp("")).toBeNull();
    expect(normalizeTimestamp("   ")).toBeNull();
    expect(normalizeTimestamp("garbage")).toBeNull();
  });

  it("returns null for non-finite numbers and other types", () => {
    expect(normalizeTimestamp(Number.NaN)).toBeNull();
    expect(normalizeTimestamp(Number.POSITIVE_INFINITY)).toBeNull();
    expect(normalizeTimestamp({})).toBeNull();
  });
});

describe("isInDateRange", () => {
  const date = new Date("2025-02-01T00:00:00Z");

  it("returns true when no bounds are specified", () => {
    expect(isInDateRange(date)).toBe(true);
  });

  it("is inclusive on both bounds", () => {
    expect(isInDateRange(date, date, date)).toBe(true);
  });

  it("returns false before from", () => {
    expect(isInDateRange(date, new Date("2025-02-02T00:00:00Z"))).toBe(false);
  });

  it("returns false after to", () => {
    expect(isInDateRange(date, undefined, new Date("2025-01-31T00:00:00Z"))).toBe(false);
  });
});

describe("parseDateOption", () => {
  it("parses ISO strings", () => {
    expect(parseDateOption("2025-02-01")?.toISOString()).toBe("2025-02-01T00:00:00.000Z");
  });

  it("treats missing and blank input as absent", () => {
    expect(parseDateOption(undefined)).toBeUndefined();
    expect(parseDateOption("")).toBeUndefined();
    expect(parseDateOption("  ")).toBeUndefined();
  });

  it("rejects input that does not parse", () => {
    expect(() => parseDateOption("last tuesday", "dateFrom")).toThrow(InvalidDateError);
    expect(() => parseDateOption("last tuesday", "dateFrom")).toThrow(
      'Invalid dateFrom "last tuesday": expected an ISO 8601 date',
    );
  });
});
