// Service wiring. STOCK_PROVIDER picks the MarketData implementation:
// "fallback" (default), "yahoo", "alphavantage" or "demo".

import { FetchHttpClient, type HttpClient } from "@effect/platform";
import { type ConfigError, Effect, Layer } from "effect";
import { providerConfig, type ProviderName } from "./config.ts";
import { ConversationLogLive } from "./conversations.ts";
import type { MarketData } from "./market-data.ts";
import {
  FallbackMarketDataLive,
  type ProviderHealth,
  staticProviderHealth,
} from "./market-data-fallback.ts";
import { MarketSnapshotsLive } from "./market-snapshot.ts";
import { AlphaVantageLive } from "./providers/alpha-vantage.ts";
import {
  type DemoFixtures,
  DemoFixturesLive,
  DemoMarketDataLive,
} from "./providers/demo-data.ts";
import { YahooFinanceLive } from "./providers/yahoo-finance.ts";

type ProviderLayer = Layer.Layer<
  MarketData | ProviderHealth,
  ConfigError.ConfigError,
  HttpClient.HttpClient | DemoFixtures
>;

export function providerLayer(provider: ProviderName): ProviderLayer {
  switch (provider) {
    case "yahoo":
      return Layer.merge(YahooFinanceLive, staticProviderHealth("yahoo"));
    case "alphavantage":
      return Layer.merge(AlphaVantageLive, staticProviderHealth("alphavantage"));
    case "demo":
      return Layer.merge(DemoMarketDataLive, staticProviderHealth("demo"));
    case "fallback":
      return FallbackMarketDataLive;
  }
}

export const MarketDataLive = Layer.unwrapEffect(
  Effect.map(providerConfig, providerLayer),
).pipe(
  Layer.provideMerge(DemoFixturesLive),
  Layer.provide(FetchHttpClient.layer),
);

/** Everything the CLI commands and the HTTP routes need, short of the
 *  platform (file system) layer. */
export const DashboardLive = Layer.mergeAll(
  MarketSnapshotsLive,
  ConversationLogLive,
).pipe(Layer.provideMerge(MarketDataLive));
