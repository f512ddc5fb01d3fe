// Symbol store: Effect shell.
//
// Wires the pure store state (symbol-store-state.ts) to a single Ref. Every
// mutation is one Ref.modify/Ref.update and every read one Ref.get, which is
// the store's only synchronization point.

import { Console, Context, Effect, Layer, Ref } from "effect";
import type { Observation } from "./domain.ts";
import * as State from "./symbol-store-state.ts";

export type { StoreState } from "./symbol-store-state.ts";

// --- Service ---

export interface SymbolStoreApi {
  readonly append: (
    symbol: string,
    observation: Observation,
  ) => Effect.Effect<void>;

  /** Seed `symbol` once; later calls are no-ops until `reset`. Resolves to
   *  whether the seed was applied. */
  readonly backfillIfNeeded: (
    symbol: string,
    historical: ReadonlyArray<Observation>,
  ) => Effect.Effect<boolean>;

  readonly snapshot: Effect.Effect<ReadonlyArray<Observation>>;
  readonly reset: (symbol: string) => Effect.Effect<void>;

  /** Reset every symbol outside `tracked`; resolves to the dropped ones. */
  readonly retain: (
    tracked: ReadonlyArray<string>,
  ) => Effect.Effect<ReadonlyArray<string>>;

  readonly isBackfilled: (symbol: string) => Effect.Effect<boolean>;
  readonly bufferOf: (
    symbol: string,
  ) => Effect.Effect<ReadonlyArray<Observation>>;
}

export class SymbolStore extends Context.Tag("SymbolStore")<
  SymbolStore,
  SymbolStoreApi
>() {}

// --- Constructor ---

export function makeSymbolStore(
  capacity: number,
): Effect.Effect<SymbolStoreApi> {
  return Effect.gen(function* () {
    const ref = yield* Ref.make(State.initialState(capacity));

    const backfillIfNeeded = (
      symbol: string,
      historical: ReadonlyArray<Observation>,
    ) =>
      Ref.modify(ref, (s) => State.backfill(s, symbol, historical)).pipe(
        Effect.tap((applied) =>
          applied
            ? Console.debug(
                `[store] ${symbol}: seeded ${historical.length} historical points`,
              )
            : Effect.void,
        ),
      );

    return {
      append: (symbol, observation) =>
        Ref.update(ref, (s) => State.append(s, symbol, observation)),
      backfillIfNeeded,
      snapshot: Ref.get(ref).pipe(Effect.map(State.snapshot)),
      reset: (symbol) => Ref.update(ref, (s) => State.reset(s, symbol)),
      retain: (tracked) => Ref.modify(ref, (s) => State.retain(s, tracked)),
      isBackfilled: (symbol) =>
        Ref.get(ref).pipe(Effect.map((s) => State.isBackfilled(s, symbol))),
      bufferOf: (symbol) =>
        Ref.get(ref).pipe(Effect.map((s) => State.bufferOf(s, symbol))),
    } satisfies SymbolStoreApi;
  });
}

// --- Layer ---

export const SymbolStoreLive = (capacity: number) =>
  Layer.effect(SymbolStore, makeSymbolStore(capacity));
