import { Command, Options } from "@effect/cli";
import { FetchHttpClient, type HttpClient } from "@effect/platform";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import process from "node:process";
import {
  Config,
  type ConfigError,
  Console,
  Duration,
  Effect,
  Layer,
  Option,
} from "effect";
import {
  type DashboardConfig,
  loadDashboardConfig,
  overrideConfig,
} from "./src/config.ts";
import { formatCycleReport, formatSnapshot } from "./src/format.ts";
import type { MarketData } from "./src/market-data.ts";
import { MarketDataTestLive } from "./src/providers/market-data-mock.ts";
import { YahooFinanceLive } from "./src/providers/yahoo-finance.ts";
import { RefreshCoordinatorLive } from "./src/refresh-coordinator.ts";
import { runDashboard } from "./src/scheduler.ts";
import { SymbolStore, SymbolStoreLive } from "./src/symbol-store.ts";

// --- CLI ---

const symbols = Options.text("symbols").pipe(
  Options.withDescription("Comma-separated ticker symbols (e.g. AAPL,SPY,MSFT)"),
  Options.optional,
);

const interval = Options.integer("interval").pipe(
  Options.withDescription("Seconds between refreshes (1-60)"),
  Options.optional,
);

const once = Options.boolean("once").pipe(
  Options.withDescription("Run a single refresh cycle and exit"),
);

const command = Command.make("stream-dash", { symbols, interval, once }).pipe(
  Command.withHandler(({ symbols, interval, once }) =>
    Effect.gen(function* () {
      const config = yield* overrideConfig(yield* loadDashboardConfig, {
        symbols: Option.getOrUndefined(Option.map(symbols, (s) => s.split(","))),
        refreshIntervalSeconds: Option.getOrUndefined(interval),
        autoRefresh: once ? false : undefined,
      });

      yield* Console.log(
        `StreamDash: ${config.symbols.join(", ")} every ${config.refreshIntervalSeconds}s` +
          ` (history ${config.history.period}/${config.history.interval})`,
      );

      yield* runDashboard({
        symbols: config.symbols,
        autoRefresh: config.autoRefresh,
        onCycle: (report) =>
          Effect.gen(function* () {
            const store = yield* SymbolStore;
            yield* Console.log(formatSnapshot(yield* store.snapshot));
            yield* Console.log(formatCycleReport(report));
          }),
      }).pipe(Effect.provide(dashboardLayer(config)));
    })
  ),
);

// --- Layers ---
// Set MARKET_DATA_PROVIDER to "yahoo" (default) or "test".

const marketDataLayer = (config: DashboardConfig) =>
  Layer.unwrapEffect(
    Effect.gen(function* () {
      const provider = yield* Config.string("MARKET_DATA_PROVIDER").pipe(
        Config.withDefault("yahoo"),
      );
      const layer: Layer.Layer<
        MarketData,
        ConfigError.ConfigError,
        HttpClient.HttpClient
      > = provider === "test"
        ? MarketDataTestLive
        : YahooFinanceLive({
            timeout: Duration.seconds(config.fetchTimeoutSeconds),
          });
      return layer;
    }),
  ).pipe(Layer.provide(FetchHttpClient.layer));

const dashboardLayer = (config: DashboardConfig) =>
  RefreshCoordinatorLive({
    refreshInterval: Duration.seconds(config.refreshIntervalSeconds),
    history: config.history,
    fetchTimeout: Duration.seconds(config.fetchTimeoutSeconds),
  }).pipe(
    Layer.provideMerge(
      Layer.merge(SymbolStoreLive(config.bufferCapacity), marketDataLayer(config)),
    ),
  );

// --- Run ---

const cli = Command.run(command, {
  name: "StreamDash",
  version: "0.1.0",
});

cli(process.argv).pipe(
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain,
);
