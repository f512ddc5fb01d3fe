// Symbol store: pure state and transitions.
//
// The store maps each symbol to its SymbolBuffer and remembers which symbols
// have been seeded with historical data. State is immutable: every
// transition returns a new value, so a reader holding an old state never
// sees a half-applied update.

import type { Observation } from "./domain.ts";
import { normalizeSymbol } from "./observation.ts";
import * as Buffer from "./symbol-buffer.ts";

// --- State ---

export interface StoreState {
  readonly capacity: number;
  readonly buffers: ReadonlyMap<string, Buffer.SymbolBuffer>;
  readonly backfilled: ReadonlySet<string>;
}

export function initialState(capacity: number): StoreState {
  return {
    capacity: Buffer.empty(capacity).capacity,
    buffers: new Map(),
    backfilled: new Set(),
  };
}

function bufferFor(state: StoreState, symbol: string): Buffer.SymbolBuffer {
  return state.buffers.get(symbol) ?? Buffer.empty(state.capacity);
}

function withBuffer(
  state: StoreState,
  symbol: string,
  buffer: Buffer.SymbolBuffer,
): ReadonlyMap<string, Buffer.SymbolBuffer> {
  const buffers = new Map(state.buffers);
  buffers.set(symbol, buffer);
  return buffers;
}

// --- Transitions ---

/** Append one observation, creating the buffer on first sight. The stored
 *  observation carries the store key as its symbol. */
export function append(
  state: StoreState,
  symbol: string,
  observation: Observation,
): StoreState {
  const key = normalizeSymbol(symbol);
  const tagged =
    observation.symbol === key ? observation : { ...observation, symbol: key };
  return {
    ...state,
    buffers: withBuffer(state, key, Buffer.push(bufferFor(state, key), tagged)),
  };
}

/** Seed a symbol with historical data unless that already happened.
 *  Returns whether the seed was applied. */
export function backfill(
  state: StoreState,
  symbol: string,
  historical: ReadonlyArray<Observation>,
): [boolean, StoreState] {
  const key = normalizeSymbol(symbol);
  if (state.backfilled.has(key)) return [false, state];

  const tagged = historical.map((o) => (o.symbol === key ? o : { ...o, symbol: key }));
  const backfilled = new Set(state.backfilled);
  backfilled.add(key);

  return [
    true,
    {
      ...state,
      buffers: withBuffer(state, key, Buffer.seed(bufferFor(state, key), tagged)),
      backfilled,
    },
  ];
}

export function reset(state: StoreState, symbol: string): StoreState {
  const key = normalizeSymbol(symbol);
  if (!state.buffers.has(key) && !state.backfilled.has(key)) return state;

  const buffers = new Map(state.buffers);
  buffers.delete(key);
  const backfilled = new Set(state.backfilled);
  backfilled.delete(key);
  return { ...state, buffers, backfilled };
}

/** Reset every symbol that is not in `tracked`. Returns the dropped symbols. */
export function retain(
  state: StoreState,
  tracked: Iterable<string>,
): [ReadonlyArray<string>, StoreState] {
  const keep = new Set(Array.from(tracked, normalizeSymbol));
  const known = new Set([...state.buffers.keys(), ...state.backfilled]);
  const dropped = [...known].filter((symbol) => !keep.has(symbol));
  return [dropped, dropped.reduce(reset, state)];
}

// --- Reads ---

export function isBackfilled(state: StoreState, symbol: string): boolean {
  return state.backfilled.has(normalizeSymbol(symbol));
}

export function bufferOf(
  state: StoreState,
  symbol: string,
): ReadonlyArray<Observation> {
  return state.buffers.get(normalizeSymbol(symbol))?.items ?? [];
}

/** Every buffered observation, buffers in creation order, items in
 *  arrival order. */
export function snapshot(state: StoreState): ReadonlyArray<Observation> {
  return [...state.buffers.values()].flatMap((buffer) => buffer.items);
}
