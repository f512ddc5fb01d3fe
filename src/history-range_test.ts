import { expect, test } from "vitest";
import {
  allowedIntervals,
  coerceRange,
  DEFAULT_RANGE,
  intervalMillis,
  isAllowed,
  PERIODS,
} from "./history-range.ts";

// --- isAllowed ---

test("isAllowed: short periods only take fine intervals", () => {
  expect(isAllowed("1d", "1m")).toBe(true);
  expect(isAllowed("1d", "1d")).toBe(false);
  expect(isAllowed("5d", "1h")).toBe(true);
});

test("isAllowed: long periods only take coarse intervals", () => {
  expect(isAllowed("max", "1m")).toBe(false);
  expect(isAllowed("5y", "1wk")).toBe(true);
  expect(isAllowed("2y", "60m")).toBe(false);
});

test("isAllowed: unknown values are never allowed", () => {
  expect(isAllowed("3w", "1d")).toBe(false);
  expect(isAllowed("1d", "7m")).toBe(false);
});

// --- coerceRange ---

test("coerceRange: valid pair passes through unchanged", () => {
  expect(coerceRange("1mo", "1d")).toEqual({
    range: { period: "1mo", interval: "1d" },
    adjustments: [],
  });
});

test("coerceRange: disallowed interval becomes the period's preferred one", () => {
  expect(coerceRange("1d", "1wk")).toEqual({
    range: DEFAULT_RANGE,
    adjustments: ['interval "1wk" is not available for period "1d", using "5m"'],
  });
});

test("coerceRange: unknown interval becomes the period's preferred one", () => {
  expect(coerceRange("1y", "7m")).toEqual({
    range: { period: "1y", interval: "1d" },
    adjustments: ['unknown interval "7m", using "1d"'],
  });
});

test("coerceRange: unknown period falls back to the default period", () => {
  expect(coerceRange("3w", "1d")).toEqual({
    range: DEFAULT_RANGE,
    adjustments: [
      'unknown period "3w", using "1d"',
      'interval "1d" is not available for period "1d", using "5m"',
    ],
  });
});

test("coerceRange: every period's fallback interval is one it allows", () => {
  for (const period of PERIODS) {
    const { range } = coerceRange(period, "bogus");
    expect(allowedIntervals(period)).toContain(range.interval);
  }
});

// --- intervalMillis ---

test("intervalMillis: nominal spacing of each interval", () => {
  expect(intervalMillis("1m")).toBe(60_000);
  expect(intervalMillis("5m")).toBe(300_000);
  expect(intervalMillis("60m")).toBe(intervalMillis("1h"));
  expect(intervalMillis("1wk")).toBe(7 * 86_400_000);
});
