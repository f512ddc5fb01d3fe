// Symbol buffer: pure fixed-capacity FIFO of observations.
//
// Appending to a full buffer evicts the oldest item. Items keep arrival
// order; the buffer never re-sorts. Every operation returns a new buffer.

import type { Observation } from "./domain.ts";

export interface SymbolBuffer {
  readonly capacity: number;
  readonly items: ReadonlyArray<Observation>;
}

export function empty(capacity: number): SymbolBuffer {
  return { capacity: Math.max(1, Math.floor(capacity)), items: [] };
}

function keepNewest(
  items: ReadonlyArray<Observation>,
  capacity: number,
): ReadonlyArray<Observation> {
  return items.length > capacity ? items.slice(items.length - capacity) : items;
}

export function push(buffer: SymbolBuffer, observation: Observation): SymbolBuffer {
  return {
    capacity: buffer.capacity,
    items: keepNewest([...buffer.items, observation], buffer.capacity),
  };
}

/** Place historical points (chronologically, tagged historical) underneath
 *  whatever the buffer already holds, then keep the newest `capacity`.
 *  Points later than the oldest buffered item are dropped, so timestamps
 *  never decrease across the merged sequence. */
export function seed(
  buffer: SymbolBuffer,
  historical: ReadonlyArray<Observation>,
): SymbolBuffer {
  const oldest = buffer.items.length > 0 ? buffer.items[0].timestamp : Infinity;
  const sorted = historical
    .filter((o) => o.timestamp <= oldest)
    .sort((a, b) => a.timestamp - b.timestamp)
    .map((o) => (o.isHistorical ? o : { ...o, isHistorical: true }));

  return {
    capacity: buffer.capacity,
    items: keepNewest([...sorted, ...buffer.items], buffer.capacity),
  };
}
