// Wiring tests for the Effect shell. Transition semantics are covered in
// symbol-store-state_test.ts.

import { Effect } from "effect";
import { expect, test } from "vitest";
import type { Observation } from "./domain.ts";
import { makeSymbolStore } from "./symbol-store.ts";

// --- Helpers ---

function obs(symbol: string, price: number, isHistorical = false): Observation {
  return { symbol, timestamp: price, price, volume: 0, isHistorical };
}

// --- Tests ---

test("wiring: appends are visible in the snapshot", async () => {
  const snapshot = await Effect.runPromise(
    Effect.gen(function* () {
      const store = yield* makeSymbolStore(3);
      for (const price of [100, 101, 102, 103]) {
        yield* store.append("AAPL", obs("AAPL", price));
      }
      return yield* store.snapshot;
    }),
  );

  expect(snapshot.map((o) => o.price)).toEqual([101, 102, 103]);
});

test("wiring: backfillIfNeeded reports whether it applied", async () => {
  const result = await Effect.runPromise(
    Effect.gen(function* () {
      const store = yield* makeSymbolStore(10);
      const first = yield* store.backfillIfNeeded("SPY", [obs("SPY", 1, true)]);
      const second = yield* store.backfillIfNeeded("SPY", [obs("SPY", 2, true)]);
      return { first, second, buffer: yield* store.bufferOf("SPY") };
    }),
  );

  expect(result.first).toBe(true);
  expect(result.second).toBe(false);
  expect(result.buffer.map((o) => o.price)).toEqual([1]);
});

test("wiring: concurrent appends never exceed capacity", async () => {
  const buffer = await Effect.runPromise(
    Effect.gen(function* () {
      const store = yield* makeSymbolStore(10);
      yield* Effect.forEach(
        Array.from({ length: 25 }, (_, i) => i),
        (i) => store.append("AAPL", obs("AAPL", i)),
        { concurrency: "unbounded" },
      );
      return yield* store.bufferOf("AAPL");
    }),
  );

  expect(buffer).toHaveLength(10);
  expect(new Set(buffer.map((o) => o.price)).size).toBe(10);
});

test("wiring: reset and retain clear backfill state", async () => {
  const result = await Effect.runPromise(
    Effect.gen(function* () {
      const store = yield* makeSymbolStore(10);
      yield* store.backfillIfNeeded("AAPL", []);
      yield* store.backfillIfNeeded("MSFT", []);
      yield* store.backfillIfNeeded("SPY", []);

      yield* store.reset("AAPL");
      const dropped = yield* store.retain(["SPY"]);

      return {
        dropped,
        aapl: yield* store.isBackfilled("AAPL"),
        msft: yield* store.isBackfilled("MSFT"),
        spy: yield* store.isBackfilled("SPY"),
      };
    }),
  );

  expect(result).toEqual({ dropped: ["MSFT"], aapl: false, msft: false, spy: true });
});
