// Ingestion: validate raw provider values and normalize them into
// Observations. Nothing malformed gets past this module.

import { Data, Effect } from "effect";
import type { Observation } from "./domain.ts";

// --- Error ---

export class MalformedObservation extends Data.TaggedError(
  "MalformedObservation",
)<{
  readonly symbol: string;
  readonly message: string;
}> {}

// --- Input ---

export interface RawObservation {
  readonly symbol: string;
  readonly timestamp: number;
  readonly price: number | null | undefined;
  readonly volume?: number | null;
  readonly isHistorical: boolean;
}

// --- Normalization ---

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

export function roundPrice(price: number): number {
  return Math.round(price * 100) / 100;
}

/** Missing, negative or non-finite volumes count as 0. */
export function normalizeVolume(volume: number | null | undefined): number {
  if (volume === null || volume === undefined) return 0;
  if (!Number.isFinite(volume) || volume < 0) return 0;
  return Math.trunc(volume);
}

export function toObservation(
  raw: RawObservation,
): Effect.Effect<Observation, MalformedObservation> {
  const symbol = normalizeSymbol(raw.symbol);
  const fail = (message: string) =>
    Effect.fail(new MalformedObservation({ symbol: raw.symbol, message }));

  if (symbol.length === 0) return fail("Empty symbol");
  if (!Number.isFinite(raw.timestamp)) return fail("Invalid timestamp");
  if (raw.price === null || raw.price === undefined) {
    return fail("Missing price");
  }
  if (!Number.isFinite(raw.price) || raw.price < 0) {
    return fail(`Invalid price: ${raw.price}`);
  }

  return Effect.succeed({
    symbol,
    timestamp: raw.timestamp,
    price: roundPrice(raw.price),
    volume: normalizeVolume(raw.volume),
    isHistorical: raw.isHistorical,
  });
}
