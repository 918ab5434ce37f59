// Market data: service definition and domain errors.

import { Context, Data, Effect } from "effect";
import type { HistoryRange, PriceHistory, StockQuote } from "./domain.ts";

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

export type MarketDataError =
  | NetworkError
  | HttpError
  | ParseError
  | SymbolNotFound
  | ServiceError;

/** One-line reason, used for logs and the "Demo mode" label. */
export function describeError(e: MarketDataError): string {
  switch (e._tag) {
    case "HttpError":
      return `HTTP ${e.status}`;
    case "SymbolNotFound":
      return `Unknown symbol ${e.symbol}`;
    default:
      return `${e._tag}: ${e.message}`;
  }
}

// --- Service ---

export class MarketData extends Context.Tag("MarketData")<
  MarketData,
  {
    readonly getQuote: (
      symbol: string,
    ) => Effect.Effect<StockQuote, MarketDataError>;
    readonly getHistory: (
      symbol: string,
      range: HistoryRange,
    ) => Effect.Effect<PriceHistory, MarketDataError>;
  }
>() {}
