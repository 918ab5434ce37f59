// Yahoo Finance: implementation of MarketData.

import { HttpClient, HttpClientRequest } from "@effect/platform";
import { Config, Effect, Layer, Schema } from "effect";
import type {
  CompanyProfile,
  HistoryRange,
  PriceBar,
  PriceHistory,
  StockQuote,
} from "../domain.ts";
import {
  HttpError,
  MarketData,
  NetworkError,
  ParseError,
  SymbolNotFound,
} from "../market-data.ts";

// --- Yahoo response schema ---

const YahooMeta = Schema.Struct({
  symbol: Schema.String,
  regularMarketPrice: Schema.Number,
  chartPreviousClose: Schema.optional(Schema.Number),
  previousClose: Schema.optional(Schema.Number),
  currency: Schema.String,
  regularMarketTime: Schema.Number,
  longName: Schema.optional(Schema.String),
  shortName: Schema.optional(Schema.String),
  exchangeName: Schema.optional(Schema.String),
  fullExchangeName: Schema.optional(Schema.String),
});

const NullableNumbers = Schema.Array(Schema.NullOr(Schema.Number));

const YahooIndicators = Schema.Struct({
  quote: Schema.Array(
    Schema.Struct({
      open: Schema.optional(NullableNumbers),
      high: Schema.optional(NullableNumbers),
      low: Schema.optional(NullableNumbers),
      close: Schema.optional(NullableNumbers),
      volume: Schema.optional(NullableNumbers),
    }),
  ),
});

const YahooResult = Schema.Struct({
  meta: YahooMeta,
  timestamp: Schema.optional(Schema.Array(Schema.Number)),
  indicators: Schema.optional(YahooIndicators),
});

const YahooChartResponse = Schema.Struct({
  chart: Schema.Struct({
    result: Schema.NullOr(Schema.Array(YahooResult)),
    error: Schema.NullOr(
      Schema.Struct({
        description: Schema.optional(Schema.String),
      }),
    ),
  }),
});

type YahooChartResponseType = typeof YahooChartResponse.Type;
type YahooResultType = typeof YahooResult.Type;
type YahooMetaType = typeof YahooMeta.Type;

// --- Decode Yahoo response ---

function decodeChart(
  json: unknown,
  symbol: string,
): Effect.Effect<YahooResultType, ParseError | SymbolNotFound> {
  return Schema.decodeUnknown(YahooChartResponse)(json).pipe(
    Effect.mapError(
      (schemaError) =>
        new ParseError({
          message: `Invalid response: ${schemaError.message}`,
        }),
    ),
    Effect.flatMap((response) => firstResult(response, symbol)),
  );
}

function firstResult(
  response: YahooChartResponseType,
  symbol: string,
): Effect.Effect<YahooResultType, SymbolNotFound> {
  const { chart } = response;
  const first = chart.result?.[0];

  if (chart.error !== null || first === undefined) {
    return Effect.fail(new SymbolNotFound({ symbol }));
  }
  return Effect.succeed(first);
}

function toQuote(
  meta: YahooMetaType,
  previousClose: number | undefined = meta.chartPreviousClose ?? meta.previousClose,
): Effect.Effect<StockQuote, ParseError> {

  if (previousClose === undefined) {
    return Effect.fail(
      new ParseError({
        message: "Missing or invalid 'previousClose'",
      }),
    );
  }

  const change = meta.regularMarketPrice - previousClose;
  const changePercent = (change / previousClose) * 100;

  return Effect.succeed({
    symbol: meta.symbol,
    price: meta.regularMarketPrice,
    change,
    changePercent,
    currency: meta.currency,
    timestamp: meta.regularMarketTime * 1000,
  });
}

function toProfile(meta: YahooMetaType): CompanyProfile {
  return {
    symbol: meta.symbol,
    name: meta.longName ?? meta.shortName ?? meta.symbol,
    exchange: meta.fullExchangeName ?? meta.exchangeName ?? "N/A",
    currency: meta.currency,
  };
}

/** Zip the parallel timestamp/indicator arrays into bars. Points without a
 *  close (halted sessions, the still-open bar on some exchanges) are dropped. */
function toBars(result: YahooResultType): PriceBar[] {
  const timestamps = result.timestamp ?? [];
  const series = result.indicators?.quote[0];
  if (series === undefined) return [];

  const bars: PriceBar[] = [];
  timestamps.forEach((ts, i) => {
    const close = series.close?.[i];
    if (close === null || close === undefined) return;
    bars.push({
      date: new Date(ts * 1000).toISOString().slice(0, 10),
      open: series.open?.[i] ?? close,
      high: series.high?.[i] ?? close,
      low: series.low?.[i] ?? close,
      close,
      volume: series.volume?.[i] ?? 0,
    });
  });
  return bars;
}

export function decodeYahooResponse(
  json: unknown,
  symbol: string,
): Effect.Effect<StockQuote, ParseError | SymbolNotFound> {
  return decodeChart(json, symbol).pipe(
    Effect.flatMap((result) => toQuote(result.meta)),
  );
}

export function decodeYahooHistory(
  json: unknown,
  symbol: string,
  range: HistoryRange,
): Effect.Effect<PriceHistory, ParseError | SymbolNotFound> {
  // With a range, chartPreviousClose is the close before the range starts,
  // so the daily change is taken against the second-to-last bar.
  return decodeChart(json, symbol).pipe(
    Effect.flatMap((result) => {
      const bars = toBars(result);
      return toQuote(
        result.meta,
        bars.at(-2)?.close ?? result.meta.previousClose ?? result.meta.chartPreviousClose,
      ).pipe(
        Effect.flatMap((quote) =>
          bars.length === 0
            ? Effect.fail(new SymbolNotFound({ symbol }))
            : Effect.succeed({
                symbol: result.meta.symbol,
                range,
                quote,
                profile: toProfile(result.meta),
                bars,
              }),
        ),
      );
    }),
  );
}

// --- Yahoo Finance layer ---

export const makeYahooFinanceApi = Effect.gen(function* () {
  const client = (yield* HttpClient.HttpClient).pipe(
    HttpClient.filterStatusOk,
    HttpClient.mapRequest(
      HttpClientRequest.setHeader("User-Agent", "Mozilla/5.0"),
    ),
  );
  const baseUrl = yield* Config.string("YAHOO_BASE_URL").pipe(
    Config.withDefault("https://query1.finance.yahoo.com/v8/finance/chart"),
  );

  const getJson = (url: string) =>
    client.get(url).pipe(
      Effect.flatMap((response) => response.json),
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
    );

  return MarketData.of({
    getQuote: (symbol: string) =>
      getJson(`${baseUrl}/${encodeURIComponent(symbol)}`).pipe(
        Effect.flatMap((json) => decodeYahooResponse(json, symbol)),
      ),
    getHistory: (symbol: string, range: HistoryRange) =>
      getJson(
        `${baseUrl}/${encodeURIComponent(symbol)}?range=${range}&interval=1d`,
      ).pipe(
        Effect.flatMap((json) => decodeYahooHistory(json, symbol, range)),
      ),
  });
});

export const YahooFinanceLive = Layer.effect(MarketData, makeYahooFinanceApi);
