// Market data: service definition, fetch errors, and per-symbol fan-out.

import { Context, Data, Duration, Effect, Either } from "effect";
import type { HistoricalBar, LiveQuote } from "./domain.ts";
import type { HistoryRange } from "./history-range.ts";

// --- Errors ---

export class NetworkError extends Data.TaggedError("NetworkError")<{
  readonly message: string;
}> {}

export class HttpError extends Data.TaggedError("HttpError")<{
  readonly status: number;
}> {}

export class ParseError extends Data.TaggedError("ParseError")<{
  readonly message: string;
}> {}

export class SymbolNotFound extends Data.TaggedError("SymbolNotFound")<{
  readonly symbol: string;
}> {}

export class ServiceError extends Data.TaggedError("ServiceError")<{
  readonly message: string;
}> {}

/** Why a fetch for one symbol did not produce data. */
export type MarketDataError =
  | NetworkError
  | HttpError
  | ParseError
  | SymbolNotFound
  | ServiceError;

// --- Results ---

/** Outcome of a batched call, one entry per requested symbol. */
export type SymbolResults<A> = ReadonlyMap<
  string,
  Either.Either<A, MarketDataError>
>;

// --- Service ---

export class MarketData extends Context.Tag("MarketData")<
  MarketData,
  {
    readonly fetchHistorical: (
      symbols: ReadonlyArray<string>,
      range: HistoryRange,
    ) => Effect.Effect<SymbolResults<ReadonlyArray<HistoricalBar>>, MarketDataError>;
    readonly fetchLiveQuotes: (
      symbols: ReadonlyArray<string>,
    ) => Effect.Effect<SymbolResults<LiveQuote>, MarketDataError>;
  }
>() {}

// --- Fan-out ---

export interface FetchEachOptions {
  readonly timeout: Duration.DurationInput;
  readonly concurrency?: number;
}

/** Run `fetchOne` for every symbol, each under its own timeout. A failure
 *  or timeout only affects that symbol's entry. */
export function fetchEach<A>(
  symbols: ReadonlyArray<string>,
  fetchOne: (symbol: string) => Effect.Effect<A, MarketDataError>,
  options: FetchEachOptions,
): Effect.Effect<SymbolResults<A>> {
  return Effect.forEach(
    symbols,
    (symbol) =>
      fetchOne(symbol).pipe(
        Effect.timeoutFail({
          duration: options.timeout,
          onTimeout: () =>
            new NetworkError({ message: `${symbol}: request timed out` }),
        }),
        Effect.either,
        Effect.map((result) => [symbol, result] as const),
      ),
    { concurrency: options.concurrency ?? "unbounded" },
  ).pipe(Effect.map((entries) => new Map(entries)));
}

/** One-line description of a fetch error, for logs. */
export function describeError(error: MarketDataError): string {
  switch (error._tag) {
    case "NetworkError":
    case "ParseError":
    case "ServiceError":
      return `${error._tag}: ${error.message}`;
    case "HttpError":
      return `HttpError: HTTP ${error.status}`;
    case "SymbolNotFound":
      return `SymbolNotFound: ${error.symbol}`;
  }
}
