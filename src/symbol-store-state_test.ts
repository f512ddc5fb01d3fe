import { expect, test } from "vitest";
import type { Observation } from "./domain.ts";
import {
  append,
  backfill,
  bufferOf,
  initialState,
  isBackfilled,
  reset,
  retain,
  snapshot,
  type StoreState,
} from "./symbol-store-state.ts";

// --- Helpers ---

function obs(
  symbol: string,
  price: number,
  timestamp = price,
  isHistorical = false,
): Observation {
  return { symbol, timestamp, price, volume: 0, isHistorical };
}

function history(symbol: string, count: number): Observation[] {
  return Array.from({ length: count }, (_, i) => obs(symbol, 10 + i, i + 1, true));
}

function backfilled(state: StoreState, symbol: string, hist: Observation[]): StoreState {
  return backfill(state, symbol, hist)[1];
}

// --- append ---

test("append: creates the buffer lazily with the store capacity", () => {
  const state = append(initialState(3), "AAPL", obs("AAPL", 100));

  expect(state.buffers.get("AAPL")?.capacity).toBe(3);
  expect(bufferOf(state, "AAPL").map((o) => o.price)).toEqual([100]);
});

test("append: capacity 3 keeps the three newest prices", () => {
  const state = [100, 101, 102, 103].reduce(
    (s, price) => append(s, "AAPL", obs("AAPL", price)),
    initialState(3),
  );

  expect(bufferOf(state, "AAPL").map((o) => o.price)).toEqual([101, 102, 103]);
});

test("append: stores the observation under the store key", () => {
  const state = append(initialState(5), "msft", obs("AAPL", 1));

  expect(bufferOf(state, "AAPL")).toEqual([]);
  expect(bufferOf(state, "MSFT")).toEqual([obs("MSFT", 1)]);
});

// --- backfill ---

test("backfill: applies once, second call is a no-op", () => {
  const [first, once] = backfill(initialState(10), "SPY", history("SPY", 3));
  const [second, twice] = backfill(once, "SPY", history("SPY", 7));

  expect(first).toBe(true);
  expect(second).toBe(false);
  expect(twice).toBe(once);
  expect(bufferOf(twice, "SPY")).toHaveLength(3);
});

test("backfill: an empty history still marks the symbol complete", () => {
  const state = backfilled(initialState(10), "SPY", []);

  expect(isBackfilled(state, "SPY")).toBe(true);
  expect(bufferOf(state, "SPY")).toEqual([]);
});

test("backfill: five historical points then one live point", () => {
  const seeded = backfilled(initialState(50), "SPY", history("SPY", 5));
  const state = append(seeded, "SPY", obs("SPY", 20, 6));

  const spy = snapshot(state).filter((o) => o.symbol === "SPY");
  expect(spy).toHaveLength(6);
  expect(spy.map((o) => o.isHistorical)).toEqual([true, true, true, true, true, false]);
  expect(spy.map((o) => o.timestamp)).toEqual([1, 2, 3, 4, 5, 6]);
});

test("backfill: truncates history to the buffer capacity", () => {
  const state = backfilled(initialState(3), "SPY", history("SPY", 5));
  expect(bufferOf(state, "SPY").map((o) => o.price)).toEqual([12, 13, 14]);
});

// --- reset ---

test("reset: then backfill reproduces a first-time backfill", () => {
  const fresh = backfilled(initialState(10), "SPY", history("SPY", 4));

  const used = append(fresh, "SPY", obs("SPY", 99, 99));
  const again = backfilled(reset(used, "SPY"), "SPY", history("SPY", 4));

  expect(again).toEqual(fresh);
});

test("reset: unknown symbol leaves state unchanged", () => {
  const state = append(initialState(3), "AAPL", obs("AAPL", 1));
  expect(reset(state, "MSFT")).toBe(state);
});

// --- retain ---

test("retain: resets symbols that are no longer tracked", () => {
  let state = backfilled(initialState(5), "AAPL", history("AAPL", 2));
  state = backfilled(state, "MSFT", history("MSFT", 2));

  const [dropped, next] = retain(state, ["aapl"]);

  expect(dropped).toEqual(["MSFT"]);
  expect(isBackfilled(next, "MSFT")).toBe(false);
  expect(bufferOf(next, "MSFT")).toEqual([]);
  expect(isBackfilled(next, "AAPL")).toBe(true);
});

// --- snapshot ---

test("snapshot: is the union of every buffer, tagged by symbol", () => {
  const symbols = ["AAPL", "SPY", "MSFT"];
  let state = initialState(4);
  for (let i = 0; i < 9; i++) {
    const symbol = symbols[i % symbols.length];
    state = append(state, symbol, obs(symbol, i));
  }

  const all = snapshot(state);
  expect(all).toHaveLength(9);
  for (const symbol of symbols) {
    expect(all.filter((o) => o.symbol === symbol)).toEqual(bufferOf(state, symbol));
  }
  expect(bufferOf(state, "SPY").map((o) => o.price)).toEqual([1, 4, 7]);
});

test("snapshot: empty store yields no observations", () => {
  expect(snapshot(initialState(5))).toEqual([]);
});
