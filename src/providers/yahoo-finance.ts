// Yahoo Finance: implementation of MarketData over the chart endpoint.

import { HttpClient, HttpClientRequest } from "@effect/platform";
import { Config, Console, Effect, Layer, Schema } from "effect";
import type { HistoricalBar, LiveQuote } from "../domain.ts";
import type { HistoryRange } from "../history-range.ts";
import {
  fetchEach,
  type FetchEachOptions,
  HttpError,
  MarketData,
  NetworkError,
  ParseError,
  SymbolNotFound,
} from "../market-data.ts";

// --- Yahoo response schema ---

const YahooMeta = Schema.Struct({
  symbol: Schema.String,
  currentPrice: Schema.optional(Schema.NullOr(Schema.Number)),
  regularMarketPrice: Schema.optional(Schema.NullOr(Schema.Number)),
  regularMarketVolume: Schema.optional(Schema.NullOr(Schema.Number)),
});

const YahooQuoteSeries = Schema.Struct({
  close: Schema.optional(Schema.Array(Schema.NullOr(Schema.Number))),
  volume: Schema.optional(Schema.Array(Schema.NullOr(Schema.Number))),
});

const YahooChartResult = Schema.Struct({
  meta: YahooMeta,
  timestamp: Schema.optional(Schema.Array(Schema.Number)),
  indicators: Schema.optional(
    Schema.Struct({ quote: Schema.Array(YahooQuoteSeries) }),
  ),
});

const YahooChartResponse = Schema.Struct({
  chart: Schema.Struct({
    result: Schema.NullOr(Schema.Array(YahooChartResult)),
    error: Schema.NullOr(
      Schema.Struct({
        description: Schema.optional(Schema.String),
      }),
    ),
  }),
});

type YahooChartResponseType = typeof YahooChartResponse.Type;

// --- Decoded chart ---

export interface YahooChart {
  readonly symbol: string;
  readonly currentPrice: number | null;
  readonly regularMarketPrice: number | null;
  readonly regularMarketVolume: number | null;
  readonly bars: ReadonlyArray<HistoricalBar>;
}

export function decodeYahooChart(
  json: unknown,
  symbol: string,
): Effect.Effect<YahooChart, ParseError | SymbolNotFound> {
  return Schema.decodeUnknown(YahooChartResponse)(json).pipe(
    Effect.mapError(
      (schemaError) =>
        new ParseError({
          message: `Invalid response: ${schemaError.message}`,
        }),
    ),
    Effect.flatMap((response) => interpretYahooChart(response, symbol)),
  );
}

function interpretYahooChart(
  response: YahooChartResponseType,
  symbol: string,
): Effect.Effect<YahooChart, SymbolNotFound> {
  const { chart } = response;

  if (chart.error !== null) {
    return Effect.fail(new SymbolNotFound({ symbol }));
  }

  if (chart.result === null || chart.result.length === 0) {
    return Effect.fail(new SymbolNotFound({ symbol }));
  }

  const { meta, timestamp = [], indicators } = chart.result[0];
  const series = indicators?.quote[0];
  const closes = series?.close ?? [];
  const volumes = series?.volume ?? [];

  // Yahoo reports epoch seconds in UTC.
  const bars = timestamp.map((seconds, i) => ({
    timestamp: seconds * 1000,
    close: closes[i] ?? null,
    volume: volumes[i] ?? null,
  }));

  return Effect.succeed({
    symbol: meta.symbol,
    currentPrice: meta.currentPrice ?? null,
    regularMarketPrice: meta.regularMarketPrice ?? null,
    regularMarketVolume: meta.regularMarketVolume ?? null,
    bars,
  });
}

// --- Live quote resolution ---

function firstFinite(
  ...candidates: ReadonlyArray<number | null | undefined>
): number | null {
  for (const value of candidates) {
    if (typeof value === "number" && Number.isFinite(value)) return value;
  }
  return null;
}

function lastNonNull(
  bars: ReadonlyArray<HistoricalBar>,
  field: "close" | "volume",
): number | null {
  for (let i = bars.length - 1; i >= 0; i--) {
    const value = bars[i][field];
    if (value !== null) return value;
  }
  return null;
}

/** Price priority is currentPrice, then regularMarketPrice, then the last
 *  intraday close. Keep this order: it decides which price counts as live. */
export function resolveLiveQuote(chart: YahooChart): LiveQuote {
  return {
    price: firstFinite(
      chart.currentPrice,
      chart.regularMarketPrice,
      lastNonNull(chart.bars, "close"),
    ),
    volume: firstFinite(
      chart.regularMarketVolume,
      lastNonNull(chart.bars, "volume"),
    ),
  };
}

/** Intraday window a live quote is read from. */
export const LIVE_RANGE: HistoryRange = { period: "1d", interval: "1m" };

// --- Yahoo Finance layer ---

export const makeYahooFinance = (options: FetchEachOptions) =>
  Effect.gen(function* () {
    const client = (yield* HttpClient.HttpClient).pipe(
      HttpClient.filterStatusOk,
      HttpClient.mapRequest(
        HttpClientRequest.setHeader("User-Agent", "Mozilla/5.0"),
      ),
    );
    const baseUrl = yield* Config.string("YAHOO_BASE_URL").pipe(
      Config.withDefault("https://query1.finance.yahoo.com/v8/finance/chart"),
    );

    const getChart = (symbol: string, range: HistoryRange) =>
      Effect.gen(function* () {
        const response = yield* client.get(
          `${baseUrl}/${encodeURIComponent(symbol)}?range=${range.period}&interval=${range.interval}`,
        );
        const json = yield* response.json;
        return yield* decodeYahooChart(json, symbol);
      }).pipe(
        Effect.scoped,
        Effect.catchTags({
          RequestError: (e) =>
            Effect.fail(new NetworkError({ message: e.message })),
          ResponseError: (e) =>
            e.reason === "StatusCode"
              ? Effect.fail(new HttpError({ status: e.response.status }))
              : Effect.fail(
                  new ParseError({
                    message: `JSON parse failed: ${e.message}`,
                  }),
                ),
        }),
        Effect.tapError((e) => Console.debug(`[yahoo] ${symbol}: ${e._tag}`)),
      );

    return MarketData.of({
      fetchHistorical: (symbols, range) =>
        fetchEach(
          symbols,
          (symbol) =>
            getChart(symbol, range).pipe(Effect.map((chart) => chart.bars)),
          options,
        ),
      fetchLiveQuotes: (symbols) =>
        fetchEach(
          symbols,
          (symbol) =>
            getChart(symbol, LIVE_RANGE).pipe(Effect.map(resolveLiveQuote)),
          options,
        ),
    });
  });

export const YahooFinanceLive = (options: FetchEachOptions) =>
  Layer.effect(MarketData, makeYahooFinance(options));
