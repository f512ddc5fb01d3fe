// Dashboard configuration: read from the environment, then normalized.
//
// Values that parse but fall outside what the dashboard supports are
// coerced to a safe value and reported as InvalidConfiguration.

import { Config, Console, Data, Effect } from "effect";
import { coerceRange, type HistoryRange } from "./history-range.ts";
import { normalizeSymbol } from "./observation.ts";

// --- Error ---

export class InvalidConfiguration extends Data.TaggedError(
  "InvalidConfiguration",
)<{
  readonly field: string;
  readonly message: string;
}> {}

// --- Types ---

export interface DashboardConfig {
  readonly symbols: ReadonlyArray<string>;
  readonly refreshIntervalSeconds: number;
  readonly history: HistoryRange;
  readonly autoRefresh: boolean;
  readonly bufferCapacity: number;
  readonly fetchTimeoutSeconds: number;
}

export interface RawDashboardConfig {
  readonly symbols: ReadonlyArray<string>;
  readonly refreshIntervalSeconds: number;
  readonly historicalPeriod: string;
  readonly historicalInterval: string;
  readonly autoRefresh: boolean;
  readonly bufferCapacity: number;
  readonly fetchTimeoutSeconds: number;
}

// --- Defaults and bounds ---

export const DEFAULT_SYMBOLS: ReadonlyArray<string> = ["AAPL", "SPY", "MSFT"];

export const REFRESH_INTERVAL_BOUNDS = { min: 1, max: 60 } as const;
export const BUFFER_CAPACITY_BOUNDS = { min: 1, max: 10_000 } as const;
export const FETCH_TIMEOUT_BOUNDS = { min: 1, max: 60 } as const;

export const DEFAULT_RAW_CONFIG: RawDashboardConfig = {
  symbols: DEFAULT_SYMBOLS,
  refreshIntervalSeconds: 5,
  historicalPeriod: "1d",
  historicalInterval: "5m",
  autoRefresh: true,
  bufferCapacity: 100,
  fetchTimeoutSeconds: 5,
};

// --- Normalization ---

/** Trim, upper-case and de-duplicate, keeping first-seen order. */
export function normalizeSymbolList(
  symbols: ReadonlyArray<string>,
): ReadonlyArray<string> {
  const seen = new Set<string>();
  for (const raw of symbols) {
    const symbol = normalizeSymbol(raw);
    if (symbol.length > 0) seen.add(symbol);
  }
  return [...seen];
}

function clampInt(
  field: string,
  value: number,
  bounds: { readonly min: number; readonly max: number },
  issues: InvalidConfiguration[],
): number {
  const clamped = Math.min(bounds.max, Math.max(bounds.min, Math.trunc(value)));
  if (clamped !== value) {
    issues.push(
      new InvalidConfiguration({
        field,
        message: `${value} is outside [${bounds.min}, ${bounds.max}], using ${clamped}`,
      }),
    );
  }
  return clamped;
}

export function normalizeConfig(raw: RawDashboardConfig): {
  readonly config: DashboardConfig;
  readonly issues: ReadonlyArray<InvalidConfiguration>;
} {
  const issues: InvalidConfiguration[] = [];

  let symbols = normalizeSymbolList(raw.symbols);
  if (symbols.length === 0) {
    issues.push(
      new InvalidConfiguration({
        field: "symbols",
        message: `no symbols configured, using ${DEFAULT_SYMBOLS.join(", ")}`,
      }),
    );
    symbols = DEFAULT_SYMBOLS;
  }

  const { range, adjustments } = coerceRange(
    raw.historicalPeriod,
    raw.historicalInterval,
  );
  for (const message of adjustments) {
    issues.push(new InvalidConfiguration({ field: "history", message }));
  }

  return {
    config: {
      symbols,
      refreshIntervalSeconds: clampInt(
        "refreshIntervalSeconds",
        raw.refreshIntervalSeconds,
        REFRESH_INTERVAL_BOUNDS,
        issues,
      ),
      history: range,
      autoRefresh: raw.autoRefresh,
      bufferCapacity: clampInt(
        "bufferCapacity",
        raw.bufferCapacity,
        BUFFER_CAPACITY_BOUNDS,
        issues,
      ),
      fetchTimeoutSeconds: clampInt(
        "fetchTimeoutSeconds",
        raw.fetchTimeoutSeconds,
        FETCH_TIMEOUT_BOUNDS,
        issues,
      ),
    },
    issues,
  };
}

// --- Environment ---

export const RawDashboardConfigFromEnv: Config.Config<RawDashboardConfig> =
  Config.all({
    symbols: Config.array(Config.string(), "STREAMDASH_SYMBOLS").pipe(
      Config.withDefault(DEFAULT_RAW_CONFIG.symbols),
    ),
    refreshIntervalSeconds: Config.integer("REFRESH_INTERVAL_SECONDS").pipe(
      Config.withDefault(DEFAULT_RAW_CONFIG.refreshIntervalSeconds),
    ),
    historicalPeriod: Config.string("HISTORICAL_PERIOD").pipe(
      Config.withDefault(DEFAULT_RAW_CONFIG.historicalPeriod),
    ),
    historicalInterval: Config.string("HISTORICAL_INTERVAL").pipe(
      Config.withDefault(DEFAULT_RAW_CONFIG.historicalInterval),
    ),
    autoRefresh: Config.boolean("AUTO_REFRESH").pipe(
      Config.withDefault(DEFAULT_RAW_CONFIG.autoRefresh),
    ),
    bufferCapacity: Config.integer("BUFFER_CAPACITY").pipe(
      Config.withDefault(DEFAULT_RAW_CONFIG.bufferCapacity),
    ),
    fetchTimeoutSeconds: Config.integer("FETCH_TIMEOUT_SECONDS").pipe(
      Config.withDefault(DEFAULT_RAW_CONFIG.fetchTimeoutSeconds),
    ),
  });

/** Log each coerced setting and hand back the normalized config. */
export function reportIssues(result: ReturnType<typeof normalizeConfig>) {
  return Effect.forEach(result.issues, (issue) =>
    Console.warn(`[config] ${issue.field}: ${issue.message}`),
  ).pipe(Effect.as(result.config));
}

export const loadDashboardConfig = Effect.gen(function* () {
  const raw = yield* RawDashboardConfigFromEnv;
  return yield* reportIssues(normalizeConfig(raw));
});

/** Apply command-line overrides on top of an environment config. */
export function overrideConfig(
  base: DashboardConfig,
  overrides: {
    readonly symbols?: ReadonlyArray<string>;
    readonly refreshIntervalSeconds?: number;
    readonly autoRefresh?: boolean;
  },
): Effect.Effect<DashboardConfig> {
  return reportIssues(
    normalizeConfig({
      symbols: overrides.symbols ?? base.symbols,
      refreshIntervalSeconds:
        overrides.refreshIntervalSeconds ?? base.refreshIntervalSeconds,
      historicalPeriod: base.history.period,
      historicalInterval: base.history.interval,
      autoRefresh: overrides.autoRefresh ?? base.autoRefresh,
      bufferCapacity: base.bufferCapacity,
      fetchTimeoutSeconds: base.fetchTimeoutSeconds,
    }),
  );
}
