import { ConfigProvider, Effect, Either } from "effect";
import { expect, test } from "vitest";
import {
  DEFAULT_RAW_CONFIG,
  loadDashboardConfig,
  normalizeConfig,
  normalizeSymbolList,
  overrideConfig,
} from "./config.ts";

// --- Helpers ---

function load(env: Record<string, string>) {
  return Effect.runPromise(
    loadDashboardConfig.pipe(
      Effect.withConfigProvider(ConfigProvider.fromMap(new Map(Object.entries(env)))),
      Effect.either,
    ),
  );
}

// --- normalizeSymbolList ---

test("normalizeSymbolList: trims, upper-cases and de-duplicates in order", () => {
  expect(normalizeSymbolList([" aapl", "SPY", "aapl", "", "msft "])).toEqual([
    "AAPL",
    "SPY",
    "MSFT",
  ]);
});

// --- normalizeConfig ---

test("normalizeConfig: defaults are valid as-is", () => {
  const { config, issues } = normalizeConfig(DEFAULT_RAW_CONFIG);

  expect(issues).toEqual([]);
  expect(config).toEqual({
    symbols: ["AAPL", "SPY", "MSFT"],
    refreshIntervalSeconds: 5,
    history: { period: "1d", interval: "5m" },
    autoRefresh: true,
    bufferCapacity: 100,
    fetchTimeoutSeconds: 5,
  });
});

test("normalizeConfig: empty symbol set falls back to the defaults", () => {
  const { config, issues } = normalizeConfig({ ...DEFAULT_RAW_CONFIG, symbols: [" "] });

  expect(config.symbols).toEqual(["AAPL", "SPY", "MSFT"]);
  expect(issues.map((i) => i.field)).toEqual(["symbols"]);
});

test("normalizeConfig: refresh interval is clamped to [1, 60]", () => {
  const low = normalizeConfig({ ...DEFAULT_RAW_CONFIG, refreshIntervalSeconds: 0 });
  const high = normalizeConfig({ ...DEFAULT_RAW_CONFIG, refreshIntervalSeconds: 90 });

  expect(low.config.refreshIntervalSeconds).toBe(1);
  expect(high.config.refreshIntervalSeconds).toBe(60);
  expect(high.issues[0].message).toBe("90 is outside [1, 60], using 60");
});

test("normalizeConfig: invalid history pair is coerced", () => {
  const { config, issues } = normalizeConfig({
    ...DEFAULT_RAW_CONFIG,
    historicalPeriod: "max",
    historicalInterval: "1m",
  });

  expect(config.history).toEqual({ period: "max", interval: "1mo" });
  expect(issues.map((i) => i._tag)).toEqual(["InvalidConfiguration"]);
  expect(issues[0].field).toBe("history");
});

test("normalizeConfig: buffer capacity has a floor of 1", () => {
  const { config } = normalizeConfig({ ...DEFAULT_RAW_CONFIG, bufferCapacity: -4 });
  expect(config.bufferCapacity).toBe(1);
});

// --- loadDashboardConfig ---

test("loadDashboardConfig: reads values from the environment", async () => {
  const result = await load({
    STREAMDASH_SYMBOLS: "tsla, nvda",
    REFRESH_INTERVAL_SECONDS: "10",
    AUTO_REFRESH: "false",
    HISTORICAL_PERIOD: "5d",
    HISTORICAL_INTERVAL: "15m",
  });

  expect(Either.isRight(result)).toBe(true);
  if (Either.isRight(result)) {
    expect(result.right).toEqual({
      symbols: ["TSLA", "NVDA"],
      refreshIntervalSeconds: 10,
      history: { period: "5d", interval: "15m" },
      autoRefresh: false,
      bufferCapacity: 100,
      fetchTimeoutSeconds: 5,
    });
  }
});

test("loadDashboardConfig: out-of-range values are coerced, not fatal", async () => {
  const result = await load({ REFRESH_INTERVAL_SECONDS: "120" });

  expect(Either.isRight(result)).toBe(true);
  if (Either.isRight(result)) {
    expect(result.right.refreshIntervalSeconds).toBe(60);
  }
});

test("loadDashboardConfig: unparseable values fail", async () => {
  const result = await load({ REFRESH_INTERVAL_SECONDS: "soon" });
  expect(Either.isLeft(result)).toBe(true);
});

// --- overrideConfig ---

test("overrideConfig: command-line values replace environment ones", async () => {
  const base = normalizeConfig(DEFAULT_RAW_CONFIG).config;
  const config = await Effect.runPromise(
    overrideConfig(base, { symbols: ["qqq", "iwm"], autoRefresh: false }),
  );

  expect(config.symbols).toEqual(["QQQ", "IWM"]);
  expect(config.autoRefresh).toBe(false);
  expect(config.refreshIntervalSeconds).toBe(5);
});
