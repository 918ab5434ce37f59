// Alpha Vantage: implementation of MarketData.

import { HttpClient } from "@effect/platform";
import { Config, Effect, Layer, Schema } from "effect";
import {
  type HistoryRange,
  type PriceBar,
  type PriceHistory,
  type StockQuote,
  quoteFromBars,
  RANGE_DAYS,
} from "../domain.ts";
import {
  HttpError,
  MarketData,
  NetworkError,
  ParseError,
  ServiceError,
  SymbolNotFound,
} from "../market-data.ts";

// --- Alpha Vantage response schemas ---

const JsonObject = Schema.Record({ key: Schema.String, value: Schema.Unknown });

const AlphaVantageGlobalQuote = Schema.Struct({
  "01. symbol": Schema.String,
  "05. price": Schema.String,
  "07. latest trading day": Schema.String,
  "08. previous close": Schema.String,
  "09. change": Schema.String,
  "10. change percent": Schema.String,
});

type AlphaVantageGlobalQuoteType = typeof AlphaVantageGlobalQuote.Type;

const AlphaVantageDailyBar = Schema.Struct({
  "1. open": Schema.String,
  "2. high": Schema.String,
  "3. low": Schema.String,
  "4. close": Schema.String,
  "5. volume": Schema.String,
});

const AlphaVantageDailySeries = Schema.Record({
  key: Schema.String,
  value: AlphaVantageDailyBar,
});

type AlphaVantageDailySeriesType = typeof AlphaVantageDailySeries.Type;

// --- Shared envelope handling ---

/** Alpha Vantage signals service-level errors (bad key, rate limit,
 *  premium endpoint) via top-level string fields and a 200 status. */
function decodeEnvelope(
  json: unknown,
): Effect.Effect<Readonly<Record<string, unknown>>, ParseError | ServiceError> {
  return Schema.decodeUnknown(JsonObject)(json).pipe(
    Effect.mapError(
      () => new ParseError({ message: "Response is not an object" }),
    ),
    Effect.flatMap(
      (obj): Effect.Effect<Readonly<Record<string, unknown>>, ServiceError> => {
        for (const field of ["Error Message", "Note", "Information"]) {
          const message = obj[field];
          if (typeof message === "string") {
            return Effect.fail(new ServiceError({ message }));
          }
        }
        return Effect.succeed(obj);
      },
    ),
  );
}

function isEmptyObject(value: unknown): boolean {
  return (
    value === undefined ||
    typeof value !== "object" ||
    value === null ||
    Object.keys(value).length === 0
  );
}

// --- Decode GLOBAL_QUOTE into StockQuote ---

export function decodeAlphaVantageResponse(
  json: unknown,
  symbol: string,
): Effect.Effect<StockQuote, ParseError | SymbolNotFound | ServiceError> {
  return decodeEnvelope(json).pipe(
    Effect.flatMap((obj): Effect.Effect<StockQuote, ParseError | SymbolNotFound> => {
      const globalQuote = obj["Global Quote"];
      if (isEmptyObject(globalQuote)) {
        return Effect.fail(new SymbolNotFound({ symbol }));
      }
      return Schema.decodeUnknown(AlphaVantageGlobalQuote)(globalQuote).pipe(
        Effect.mapError(
          (e) => new ParseError({ message: `Invalid response: ${e.message}` }),
        ),
        Effect.flatMap(toStockQuote),
      );
    }),
  );
}

function toStockQuote(
  q: AlphaVantageGlobalQuoteType,
): Effect.Effect<StockQuote, ParseError> {
  const price = Number(q["05. price"]);
  const previousClose = Number(q["08. previous close"]);
  const change = Number(q["09. change"]);
  const changePercent = Number(q["10. change percent"].replace("%", ""));

  if ([price, previousClose, change, changePercent].some(Number.isNaN)) {
    return Effect.fail(
      new ParseError({ message: "Non-numeric value in quote data" }),
    );
  }

  return Effect.succeed({
    symbol: q["01. symbol"],
    price,
    change,
    changePercent,
    currency: "USD", // Alpha Vantage GLOBAL_QUOTE does not return currency
    timestamp: new Date(q["07. latest trading day"]).getTime(),
  });
}

// --- Decode TIME_SERIES_DAILY into PriceHistory ---

export function decodeAlphaVantageHistory(
  json: unknown,
  symbol: string,
  range: HistoryRange,
): Effect.Effect<PriceHistory, ParseError | SymbolNotFound | ServiceError> {
  return decodeEnvelope(json).pipe(
    Effect.flatMap((obj): Effect.Effect<PriceBar[], ParseError | SymbolNotFound> => {
      const series = obj["Time Series (Daily)"];
      if (isEmptyObject(series)) {
        return Effect.fail(new SymbolNotFound({ symbol }));
      }
      return Schema.decodeUnknown(AlphaVantageDailySeries)(series).pipe(
        Effect.mapError(
          (e) => new ParseError({ message: `Invalid response: ${e.message}` }),
        ),
        Effect.flatMap((daily) => toBars(daily)),
      );
    }),
    Effect.flatMap((allBars): Effect.Effect<PriceHistory, SymbolNotFound> => {
      const bars = allBars.slice(-RANGE_DAYS[range]);
      const upper = symbol.toUpperCase();
      const quote = quoteFromBars(upper, "USD", bars);
      return quote === undefined
        ? Effect.fail(new SymbolNotFound({ symbol }))
        : Effect.succeed({
            symbol: upper,
            range,
            quote,
            // The daily series carries no company metadata.
            profile: { symbol: upper, name: upper, exchange: "N/A", currency: "USD" },
            bars,
          });
    }),
  );
}

function toBars(
  daily: AlphaVantageDailySeriesType,
): Effect.Effect<PriceBar[], ParseError> {
  const bars = Object.entries(daily)
    .map(([date, bar]) => ({
      date,
      open: Number(bar["1. open"]),
      high: Number(bar["2. high"]),
      low: Number(bar["3. low"]),
      close: Number(bar["4. close"]),
      volume: Number(bar["5. volume"]),
    }))
    .sort((a, b) => a.date.localeCompare(b.date));

  const invalid = bars.some((b) =>
    [b.open, b.high, b.low, b.close, b.volume].some(Number.isNaN),
  );
  return invalid
    ? Effect.fail(new ParseError({ message: "Non-numeric value in daily series" }))
    : Effect.succeed(bars);
}

// --- Alpha Vantage layer ---

export const makeAlphaVantageApi = Effect.gen(function* () {
  const client = (yield* HttpClient.HttpClient).pipe(
    HttpClient.filterStatusOk,
  );
  const apiKey = yield* Config.string("ALPHA_VANTAGE_API_KEY");
  const baseUrl = yield* Config.string("ALPHA_VANTAGE_BASE_URL").pipe(
    Config.withDefault("https://www.alphavantage.co/query"),
  );

  const query = (fn: string, symbol: string) =>
    client
      .get(
        `${baseUrl}?function=${fn}&symbol=${encodeURIComponent(symbol)}&apikey=${apiKey}`,
      )
      .pipe(
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
      query("GLOBAL_QUOTE", symbol).pipe(
        Effect.flatMap((json) => decodeAlphaVantageResponse(json, symbol)),
      ),
    getHistory: (symbol: string, range: HistoryRange) =>
      query("TIME_SERIES_DAILY", symbol).pipe(
        Effect.flatMap((json) =>
          decodeAlphaVantageHistory(json, symbol, range),
        ),
      ),
  });
});

export const AlphaVantageLive = Layer.effect(MarketData, makeAlphaVantageApi);
