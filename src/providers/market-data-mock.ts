// MarketDataTest: deterministic implementation of MarketData for
// development and tests. Prices follow a rising trend with alternating noise.

import { Clock, Effect, Either, Layer, Ref } from "effect";
import type { HistoricalBar, LiveQuote } from "../domain.ts";
import { intervalMillis } from "../history-range.ts";
import { MarketData, SymbolNotFound } from "../market-data.ts";

// --- Sample data ---

export const BASE_PRICES: Readonly<Record<string, number>> = {
  AAPL: 150,
  SPY: 400,
  MSFT: 300,
};

export const HISTORY_POINTS = 30;

/** Price of the `index`-th point of a series starting at `base`. */
export function mockPrice(base: number, index: number): number {
  return base + index * 0.5 + (index % 2 === 0 ? 2 : -2);
}

// --- Constructor ---

export const makeMockMarketData = (
  basePrices: Readonly<Record<string, number>> = BASE_PRICES,
) =>
  Effect.gen(function* () {
    // Next live index per symbol; live points continue the historical series.
    const cursors = yield* Ref.make(new Map<string, number>());

    const baseOf = (symbol: string) => {
      const base = basePrices[symbol.toUpperCase()];
      return base !== undefined
        ? Either.right(base)
        : Either.left(new SymbolNotFound({ symbol }));
    };

    const historyFor = (
      symbol: string,
      now: number,
      stepMs: number,
    ): Either.Either<ReadonlyArray<HistoricalBar>, SymbolNotFound> =>
      Either.map(baseOf(symbol), (base) =>
        Array.from({ length: HISTORY_POINTS }, (_, i) => ({
          timestamp: now - (HISTORY_POINTS - 1 - i) * stepMs,
          close: mockPrice(base, i),
          volume: null,
        })),
      );

    const nextQuote = (symbol: string) =>
      Ref.modify(cursors, (current) => {
        const index = current.get(symbol) ?? HISTORY_POINTS;
        const next = new Map(current);
        next.set(symbol, index + 1);
        return [index, next] as const;
      }).pipe(
        Effect.map(
          (index): Either.Either<LiveQuote, SymbolNotFound> =>
            Either.map(baseOf(symbol), (base) => ({
              price: mockPrice(base, index),
              volume: null,
            })),
        ),
      );

    return MarketData.of({
      // Always HISTORY_POINTS bars, spaced by the range's interval.
      fetchHistorical: (symbols, range) =>
        Clock.currentTimeMillis.pipe(
          Effect.map((now) => {
            const stepMs = intervalMillis(range.interval);
            return new Map(
              symbols.map((s) => [s, historyFor(s, now, stepMs)] as const),
            );
          }),
        ),
      fetchLiveQuotes: (symbols) =>
        Effect.forEach(symbols, (s) =>
          nextQuote(s).pipe(Effect.map((quote) => [s, quote] as const)),
        ).pipe(Effect.map((entries) => new Map(entries))),
    });
  });

// --- Mock layer ---

export const MarketDataTestLive = Layer.effect(
  MarketData,
  makeMockMarketData(),
);
