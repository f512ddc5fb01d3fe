// Historical (period, interval) pairs the provider accepts.
//
// Short periods only pair with fine intervals and long periods only with
// coarse ones. Anything else is coerced here, before a fetch is built.

export const PERIODS = [
  "1d",
  "5d",
  "1mo",
  "3mo",
  "6mo",
  "ytd",
  "1y",
  "2y",
  "5y",
  "10y",
  "max",
] as const;

export const INTERVALS = [
  "1m",
  "2m",
  "5m",
  "15m",
  "30m",
  "60m",
  "90m",
  "1h",
  "1d",
  "1wk",
  "1mo",
  "3mo",
] as const;

export type HistoricalPeriod = (typeof PERIODS)[number];
export type HistoricalInterval = (typeof INTERVALS)[number];

export interface HistoryRange {
  readonly period: HistoricalPeriod;
  readonly interval: HistoricalInterval;
}

export const DEFAULT_RANGE: HistoryRange = { period: "1d", interval: "5m" };

// --- Allowed combinations ---

const INTRADAY = ["1m", "2m", "5m", "15m", "30m", "60m", "90m"] as const;
const HOURLY_UP = ["60m", "1h", "1d", "1wk"] as const;
const DAILY_UP = ["1d", "1wk", "1mo", "3mo"] as const;

const ALLOWED: Record<HistoricalPeriod, ReadonlyArray<HistoricalInterval>> = {
  "1d": INTRADAY,
  "5d": [...INTRADAY, "1h"],
  "1mo": ["2m", "5m", "15m", "30m", "60m", "90m", "1h", "1d"],
  "3mo": HOURLY_UP,
  "6mo": HOURLY_UP,
  ytd: [...HOURLY_UP, "1mo"],
  "1y": [...HOURLY_UP, "1mo"],
  "2y": ["1d", "1wk", "1mo"],
  "5y": DAILY_UP,
  "10y": DAILY_UP,
  max: DAILY_UP,
};

const PREFERRED: Record<HistoricalPeriod, HistoricalInterval> = {
  "1d": "5m",
  "5d": "15m",
  "1mo": "30m",
  "3mo": "1d",
  "6mo": "1d",
  ytd: "1d",
  "1y": "1d",
  "2y": "1d",
  "5y": "1wk",
  "10y": "1wk",
  max: "1mo",
};

const MINUTE_MS = 60_000;
const DAY_MS = 24 * 60 * MINUTE_MS;

/** Nominal spacing between bars of each interval. */
const INTERVAL_MS: Readonly<Record<HistoricalInterval, number>> = {
  "1m": MINUTE_MS,
  "2m": 2 * MINUTE_MS,
  "5m": 5 * MINUTE_MS,
  "15m": 15 * MINUTE_MS,
  "30m": 30 * MINUTE_MS,
  "60m": 60 * MINUTE_MS,
  "90m": 90 * MINUTE_MS,
  "1h": 60 * MINUTE_MS,
  "1d": DAY_MS,
  "1wk": 7 * DAY_MS,
  "1mo": 30 * DAY_MS,
  "3mo": 90 * DAY_MS,
};

export function intervalMillis(interval: HistoricalInterval): number {
  return INTERVAL_MS[interval];
}

const PERIOD_SET: ReadonlySet<string> = new Set(PERIODS);
const INTERVAL_SET: ReadonlySet<string> = new Set(INTERVALS);

export function isPeriod(value: string): value is HistoricalPeriod {
  return PERIOD_SET.has(value);
}

export function isInterval(value: string): value is HistoricalInterval {
  return INTERVAL_SET.has(value);
}

export function allowedIntervals(
  period: HistoricalPeriod,
): ReadonlyArray<HistoricalInterval> {
  return ALLOWED[period];
}

export function isAllowed(period: string, interval: string): boolean {
  return isPeriod(period) && ALLOWED[period].some((i) => i === interval);
}

// --- Coercion ---

export interface CoercedRange {
  readonly range: HistoryRange;
  /** One entry per adjustment; empty when the input was already valid. */
  readonly adjustments: ReadonlyArray<string>;
}

export function coerceRange(period: string, interval: string): CoercedRange {
  const adjustments: string[] = [];

  const p: HistoricalPeriod = isPeriod(period) ? period : DEFAULT_RANGE.period;
  if (p !== period) {
    adjustments.push(`unknown period "${period}", using "${p}"`);
  }

  const i = ALLOWED[p].find((allowed) => allowed === interval) ?? PREFERRED[p];
  if (i !== interval) {
    adjustments.push(
      isInterval(interval)
        ? `interval "${interval}" is not available for period "${p}", using "${i}"`
        : `unknown interval "${interval}", using "${i}"`,
    );
  }

  return { range: { period: p, interval: i }, adjustments };
}
