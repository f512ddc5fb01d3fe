// Refresh coordinator: Effect shell.
//
// Wires the pure refresh schedule (refresh-schedule.ts) to a Ref and runs
// fetch-and-merge cycles against the MarketData service and SymbolStore.
// Per-symbol failures become entries in the cycle report; nothing a
// provider does can fail a cycle.

import {
  Clock,
  Console,
  Context,
  Duration,
  Effect,
  Either,
  Layer,
  Option,
  Ref,
} from "effect";
import { DEFAULT_SYMBOLS, normalizeSymbolList } from "./config.ts";
import type { Observation } from "./domain.ts";
import { coerceRange, type HistoryRange } from "./history-range.ts";
import {
  describeError,
  MarketData,
  type MarketDataError,
  NetworkError,
  type SymbolResults,
  SymbolNotFound,
} from "./market-data.ts";
import { type MalformedObservation, toObservation } from "./observation.ts";
import {
  complete,
  initialState,
  type RefreshState,
  type Trigger,
  trigger,
  type TriggerDecision,
} from "./refresh-schedule.ts";
import { SymbolStore } from "./symbol-store.ts";

export type { RefreshState } from "./refresh-schedule.ts";

// --- Options ---

export interface RefreshCoordinatorOptions {
  readonly refreshInterval: Duration.DurationInput;
  /** Coerced against the allowed table before any fetch is built. */
  readonly history: { readonly period: string; readonly interval: string };
  /** Per-call provider timeout; a whole batch gets twice this. */
  readonly fetchTimeout: Duration.DurationInput;
}

// --- Report ---

export type CycleStage = "historical" | "live";

export interface SymbolFailure {
  readonly symbol: string;
  readonly stage: CycleStage;
  readonly error: MarketDataError | MalformedObservation;
}

export interface CycleReport {
  readonly symbols: ReadonlyArray<string>;
  readonly startedAt: number;
  readonly completedAt: number;
  readonly backfilled: ReadonlyArray<string>;
  readonly appended: ReadonlyArray<string>;
  readonly failures: ReadonlyArray<SymbolFailure>;
}

/** Symbols whose live quote did not make it into the store. */
export function staleSymbols(report: CycleReport): ReadonlyArray<string> {
  return report.failures
    .filter((f) => f.stage === "live")
    .map((f) => f.symbol);
}

export function describeFailure(failure: SymbolFailure): string {
  const { error } = failure;
  return error._tag === "MalformedObservation"
    ? `MalformedObservation: ${error.message}`
    : describeError(error);
}

// --- Service ---

interface Gate {
  readonly schedule: RefreshState;
  /** Symbols of the latest manual request deferred during a cycle. */
  readonly deferred: ReadonlyArray<string>;
}

export interface RefreshCoordinatorApi {
  /** Manual trigger: runs a cycle now, or defers it by one cycle if one is
   *  already in flight (resolving to None). */
  readonly runRefreshCycle: (
    trackedSymbols: ReadonlyArray<string>,
  ) => Effect.Effect<Option.Option<CycleReport>>;

  /** Poll trigger: runs a cycle only once the refresh interval has elapsed
   *  since the last one completed. */
  readonly tick: (
    trackedSymbols: ReadonlyArray<string>,
  ) => Effect.Effect<Option.Option<CycleReport>>;

  readonly state: Effect.Effect<RefreshState>;
  readonly history: HistoryRange;
}

export class RefreshCoordinator extends Context.Tag("RefreshCoordinator")<
  RefreshCoordinator,
  RefreshCoordinatorApi
>() {}

// --- Constructor ---

export function makeRefreshCoordinator(
  options: RefreshCoordinatorOptions,
): Effect.Effect<RefreshCoordinatorApi, never, SymbolStore | MarketData> {
  return Effect.gen(function* () {
    const store = yield* SymbolStore;
    const market = yield* MarketData;

    const intervalMs = Duration.toMillis(Duration.decode(options.refreshInterval));
    const batchTimeout = Duration.times(Duration.decode(options.fetchTimeout), 2);

    const { range: history, adjustments } = coerceRange(
      options.history.period,
      options.history.interval,
    );
    yield* Effect.forEach(adjustments, (message) =>
      Console.warn(`[refresh] history: ${message}`),
    );

    // The schedule state and the symbols of a deferred manual request
    // change together, in one Ref.modify.
    const gateRef = yield* Ref.make<Gate>({ schedule: initialState, deferred: [] });

    // --- Helpers ---

    const trackedSymbols = (requested: ReadonlyArray<string>) => {
      const symbols = normalizeSymbolList(requested);
      return symbols.length > 0
        ? Effect.succeed(symbols)
        : Console.warn(
            `[refresh] no symbols tracked, using ${DEFAULT_SYMBOLS.join(", ")}`,
          ).pipe(Effect.as(DEFAULT_SYMBOLS));
    };

    /** Bound a batched call; a batch that fails as a whole fails every
     *  symbol in it. */
    const guardBatch = <A>(
      stage: CycleStage,
      batch: Effect.Effect<SymbolResults<A>, MarketDataError>,
    ) =>
      batch.pipe(
        Effect.timeoutFail({
          duration: batchTimeout,
          onTimeout: () =>
            new NetworkError({ message: `${stage} batch timed out` }),
        }),
        Effect.either,
      );

    const resultFor = <A>(
      batch: Either.Either<SymbolResults<A>, MarketDataError>,
      symbol: string,
    ): Either.Either<A, MarketDataError> =>
      Either.isLeft(batch)
        ? Either.left(batch.left)
        : batch.right.get(symbol) ?? Either.left(new SymbolNotFound({ symbol }));

    // --- Step 1: historical backfill for symbols not yet seeded ---

    const backfillStep = (symbols: ReadonlyArray<string>) =>
      Effect.gen(function* () {
        const backfilled: string[] = [];
        const failures: SymbolFailure[] = [];

        const needed = yield* Effect.filter(symbols, (symbol) =>
          store.isBackfilled(symbol).pipe(Effect.map((done) => !done)),
        );
        if (needed.length === 0) return { backfilled, failures };

        const batch = yield* guardBatch(
          "historical",
          market.fetchHistorical(needed, history),
        );

        for (const symbol of needed) {
          const result = resultFor(batch, symbol);
          if (Either.isLeft(result)) {
            failures.push({ symbol, stage: "historical", error: result.left });
            yield* Console.warn(
              `[refresh] ${symbol}: historical fetch failed (${describeError(result.left)}), retrying next cycle`,
            );
            continue;
          }

          const [malformed, observations] = yield* Effect.partition(
            result.right,
            (bar) =>
              toObservation({
                symbol,
                timestamp: bar.timestamp,
                price: bar.close,
                volume: bar.volume,
                isHistorical: true,
              }),
          );
          if (malformed.length > 0) {
            yield* Console.debug(
              `[refresh] ${symbol}: dropped ${malformed.length} malformed historical points`,
            );
          }

          if (yield* store.backfillIfNeeded(symbol, observations)) {
            backfilled.push(symbol);
          }
        }

        return { backfilled, failures };
      });

    // --- Step 2: live quotes for every tracked symbol ---

    const liveStep = (symbols: ReadonlyArray<string>) =>
      Effect.gen(function* () {
        const appended: string[] = [];
        const failures: SymbolFailure[] = [];

        const batch = yield* guardBatch("live", market.fetchLiveQuotes(symbols));
        const now = yield* Clock.currentTimeMillis;

        for (const symbol of symbols) {
          const result = resultFor(batch, symbol);
          const observation: Either.Either<
            Observation,
            MarketDataError | MalformedObservation
          > = Either.isLeft(result)
            ? Either.left(result.left)
            : yield* Effect.either(
                toObservation({
                  symbol,
                  timestamp: now,
                  price: result.right.price,
                  volume: result.right.volume,
                  isHistorical: false,
                }),
              );

          if (Either.isLeft(observation)) {
            const failure: SymbolFailure = {
              symbol,
              stage: "live",
              error: observation.left,
            };
            failures.push(failure);
            yield* Console.warn(
              `[refresh] ${symbol}: live quote skipped (${describeFailure(failure)})`,
            );
            continue;
          }

          yield* store.append(symbol, observation.right);
          appended.push(symbol);
        }

        return { appended, failures };
      });

    // --- Cycle ---

    const cycle = (requested: ReadonlyArray<string>) =>
      Effect.gen(function* () {
        const startedAt = yield* Clock.currentTimeMillis;
        const symbols = yield* trackedSymbols(requested);

        const dropped = yield* store.retain(symbols);
        if (dropped.length > 0) {
          yield* Console.debug(`[refresh] no longer tracked: ${dropped.join(", ")}`);
        }

        // Backfill first, so a new symbol's first live point lands on top
        // of its history.
        const backfill = yield* backfillStep(symbols);
        const live = yield* liveStep(symbols);

        const report: CycleReport = {
          symbols,
          startedAt,
          completedAt: yield* Clock.currentTimeMillis,
          backfilled: backfill.backfilled,
          appended: live.appended,
          failures: [...backfill.failures, ...live.failures],
        };

        yield* Console.debug(
          `[refresh] cycle done: ${report.appended.length}/${symbols.length} symbols updated`,
        );
        return report;
      });

    // --- Gate ---

    const finish = Clock.currentTimeMillis.pipe(
      Effect.flatMap((now) =>
        Ref.modify(gateRef, (gate): [Option.Option<ReadonlyArray<string>>, Gate] => {
          const [owed, schedule] = complete(gate.schedule, now);
          return [
            owed ? Option.some(gate.deferred) : Option.none(),
            { schedule, deferred: [] },
          ];
        }),
      ),
    );

    const run = (
      kind: Trigger,
      requested: ReadonlyArray<string>,
    ): Effect.Effect<Option.Option<CycleReport>> =>
      Effect.gen(function* () {
        const now = yield* Clock.currentTimeMillis;

        const decision = yield* Ref.modify(gateRef, (gate): [TriggerDecision, Gate] => {
          const [next, schedule] = trigger(gate.schedule, kind, now, intervalMs);
          const deferred =
            next === "defer" && kind === "manual" ? requested : gate.deferred;
          return [next, { schedule, deferred }];
        });

        if (decision === "wait") return Option.none();
        if (decision === "defer") {
          yield* Console.debug(`[refresh] cycle in flight, ${kind} trigger deferred`);
          return Option.none();
        }

        const report = yield* cycle(requested).pipe(
          Effect.onError(() => Effect.asVoid(finish)),
        );
        const owed = yield* finish;
        if (Option.isNone(owed)) return Option.some(report);

        yield* Console.debug("[refresh] running deferred manual refresh");
        return yield* run("manual", owed.value).pipe(
          Effect.map(Option.orElse(() => Option.some(report))),
        );
      });

    return {
      runRefreshCycle: (trackedSymbols) => run("manual", trackedSymbols),
      tick: (trackedSymbols) => run("tick", trackedSymbols),
      state: Ref.get(gateRef).pipe(Effect.map((gate) => gate.schedule)),
      history,
    } satisfies RefreshCoordinatorApi;
  });
}

// --- Layer ---

export const RefreshCoordinatorLive = (options: RefreshCoordinatorOptions) =>
  Layer.effect(RefreshCoordinator, makeRefreshCoordinator(options));
