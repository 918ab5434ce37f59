// Fallback MarketData: tries providers in order, with circuit breakers.

import { Context, Effect, Layer } from "effect";
import {
  type BreakerStats,
  makeCircuitBreaker,
  type CircuitBreaker,
  type CircuitOpenError,
} from "./circuit-breaker.ts";
import type { HistoryRange } from "./domain.ts";
import {
  MarketData,
  type MarketDataError,
  NetworkError,
  ServiceError,
} from "./market-data.ts";
import { makeYahooFinanceApi } from "./providers/yahoo-finance.ts";
import { makeAlphaVantageApi } from "./providers/alpha-vantage.ts";

// --- Types ---

type MarketDataApi = Context.Tag.Service<MarketData>;

export interface NamedProvider {
  readonly name: string;
  readonly api: MarketDataApi;
}

/** Which providers back MarketData, and how their breakers are doing. */
export class ProviderHealth extends Context.Tag("ProviderHealth")<
  ProviderHealth,
  {
    readonly providers: readonly string[];
    readonly breakers: Effect.Effect<readonly BreakerStats[]>;
  }
>() {}

export const staticProviderHealth = (name: string) =>
  Layer.succeed(
    ProviderHealth,
    ProviderHealth.of({ providers: [name], breakers: Effect.succeed([]) }),
  );

// --- Trippable error predicate ---

/** Errors that indicate the provider is unhealthy. SymbolNotFound is NOT
 *  trippable; it's a valid domain answer that should propagate immediately. */
export function isTrippable(e: MarketDataError | CircuitOpenError): boolean {
  switch (e._tag) {
    case "NetworkError":
    case "ParseError":
    case "ServiceError":
    case "CircuitOpenError":
      return true;
    case "HttpError":
      return e.status >= 500;
    case "SymbolNotFound":
      return false;
  }
}

// --- Circuit breaker boundary ---

/** Per-provider timeout so a hanging request fails fast and the fallback
 *  can try the next provider within the overall request timeout. */
const PROVIDER_TIMEOUT = "5 seconds";

/** Wrap every call of a provider with a timeout and its circuit breaker,
 *  mapping CircuitOpenError to ServiceError at this boundary so the
 *  fallback loop only sees MarketDataError. */
export function withBreaker(
  name: string,
  api: MarketDataApi,
  breaker: CircuitBreaker<MarketDataError>,
): MarketDataApi {
  const guard = <A>(
    call: Effect.Effect<A, MarketDataError>,
  ): Effect.Effect<A, MarketDataError> =>
    breaker
      .execute(
        call.pipe(
          Effect.timeoutFail({
            duration: PROVIDER_TIMEOUT,
            onTimeout: () =>
              new NetworkError({ message: `${name}: request timed out` }),
          }),
        ),
      )
      .pipe(
        Effect.mapError((e) =>
          e._tag === "CircuitOpenError"
            ? new ServiceError({ message: `${name}: circuit open` })
            : e,
        ),
      );

  return MarketData.of({
    getQuote: (symbol) => guard(api.getQuote(symbol)),
    getHistory: (symbol, range) => guard(api.getHistory(symbol, range)),
  });
}

// --- Fallback logic ---

export function tryProviders<A>(
  providers: readonly NamedProvider[],
  call: (api: MarketDataApi) => Effect.Effect<A, MarketDataError>,
): Effect.Effect<A, MarketDataError> {
  const loop = (
    index: number,
    lastError: MarketDataError,
  ): Effect.Effect<A, MarketDataError> => {
    const provider = providers[index];
    if (provider === undefined) return Effect.fail(lastError);

    return Effect.logDebug(`[fallback] trying ${provider.name}...`).pipe(
      Effect.flatMap(() => call(provider.api)),
      Effect.tapError((e) =>
        Effect.logDebug(`[fallback] ${provider.name} failed: ${e._tag}`),
      ),
      Effect.catchIf(isTrippable, (e) => loop(index + 1, e)),
    );
  };

  return loop(0, new ServiceError({ message: "No providers configured" }));
}

export function fallbackMarketData(
  providers: readonly NamedProvider[],
): MarketDataApi {
  return MarketData.of({
    getQuote: (symbol: string) =>
      tryProviders(providers, (api) => api.getQuote(symbol)),
    getHistory: (symbol: string, range: HistoryRange) =>
      tryProviders(providers, (api) => api.getHistory(symbol, range)),
  });
}

// --- Layer ---

const breakerFor = (name: string) =>
  makeCircuitBreaker<MarketDataError>({
    name: `cb:${name}`,
    maxFailures: 3,
    resetTimeout: "30 seconds",
    isTrippable,
  });

export const FallbackMarketDataLive = Layer.effectContext(
  Effect.gen(function* () {
    const yahoo = yield* makeYahooFinanceApi;
    const alphavantage = yield* makeAlphaVantageApi.pipe(
      Effect.catchTag("ConfigError", () =>
        // Alpha Vantage requires an API key; skip if not configured.
        Effect.succeed(undefined),
      ),
    );

    const yahooCb = yield* breakerFor("yahoo");
    const breakers = [yahooCb];
    const providers: NamedProvider[] = [
      { name: "yahoo", api: withBreaker("yahoo", yahoo, yahooCb) },
    ];

    if (alphavantage !== undefined) {
      const avCb = yield* breakerFor("alphavantage");
      breakers.push(avCb);
      providers.push({
        name: "alphavantage",
        api: withBreaker("alphavantage", alphavantage, avCb),
      });
    }

    yield* Effect.logInfo(
      `[fallback] initialized with providers: ${providers.map((p) => p.name).join(", ")}`,
    );

    return Context.make(MarketData, fallbackMarketData(providers)).pipe(
      Context.add(
        ProviderHealth,
        ProviderHealth.of({
          providers: providers.map((p) => p.name),
          breakers: Effect.all(breakers.map((cb) => cb.stats)),
        }),
      ),
    );
  }),
);
