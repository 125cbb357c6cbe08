import { describe, it, expect } from "vitest";
import { FRESHNESS_WINDOW_SECONDS, isFresh, parseCreated } from "../src/freshness.js";

const NOW = new Date("2026-03-01T12:00:00.000Z");

function shifted(seconds: number): string {
  return new Date(NOW.getTime() + seconds * 1000).toISOString();
}

describe("parseCreated", () => {
  it("treats a trailing Z as UTC", () => {
    expect(parseCreated("2026-03-01T12:00:00Z")).toBe(NOW.getTime());
    expect(parseCreated("2026-03-01T12:00:00.000Z")).toBe(NOW.getTime());
  });

  it("applies explicit offsets", () => {
    expect(parseCreated("2026-03-01T14:00:00+02:00")).toBe(NOW.getTime());
    expect(parseCreated("2026-03-01T07:30:00-04:30")).toBe(NOW.getTime());
  });

  it("keeps millisecond precision and truncates finer fractions", () => {
    expect(parseCreated("2026-03-01T12:00:00.5Z")).toBe(NOW.getTime() + 500);
    expect(parseCreated("2026-03-01T12:00:00.123456Z")).toBe(NOW.getTime() + 123);
  });

  it.each([
    "",
    "garbage",
    "2026-03-01T12:00:00",
    "2026-03-01",
    "2026-13-01T12:00:00Z",
    "2026-02-30T12:00:00Z",
    "2026-03-01T24:00:00Z",
    "2026-03-01T12:60:00Z",
    "Sun, 01 Mar 2026 12:00:00 GMT",
    " 2026-03-01T12:00:00Z",
    "2026-03-01T12:00:00Z ",
    "\n2026-03-01T12:00:00Z\n",
  ])("returns null for %j", (value) => {
    expect(parseCreated(value)).toBeNull();
  });
});

describe("isFresh", () => {
  it("uses a 300 second window", () => {
    expect(FRESHNESS_WINDOW_SECONDS).toBe(300);
  });

  it("accepts a timestamp equal to now", () => {
    expect(isFresh(shifted(0), NOW)).toBe(true);
  });

  it("accepts exactly +/-300 seconds", () => {
    expect(isFresh(shifted(-300), NOW)).toBe(true);
    expect(isFresh(shifted(300), NOW)).toBe(true);
  });

  it("rejects beyond the window in either direction", () => {
    expect(isFresh(shifted(-301), NOW)).toBe(false);
    expect(isFresh(shifted(301), NOW)).toBe(false);
    expect(isFresh(new Date(NOW.getTime() - 300_001).toISOString(), NOW)).toBe(false);
  });

  it("accepts client clocks slightly ahead", () => {
    expect(isFresh(shifted(30), NOW)).toBe(true);
  });

  it("fails closed on unparseable input", () => {
    expect(isFresh("not-a-date", NOW)).toBe(false);
    expect(isFresh("2026-03-01T12:00:00", NOW)).toBe(false);
    expect(isFresh(" 2026-03-01T12:00:00Z ", NOW)).toBe(false);
  });

  it("honours a custom window", () => {
    expect(isFresh(shifted(-10), NOW, 5)).toBe(false);
    expect(isFresh(shifted(-5), NOW, 5)).toBe(true);
  });
});
