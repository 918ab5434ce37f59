// Environment configuration read through effect's Config.

import { Config, Effect, Layer, Logger, LogLevel } from "effect";

export const PROVIDERS = ["fallback", "yahoo", "alphavantage", "demo"] as const;

export type ProviderName = (typeof PROVIDERS)[number];

export const providerConfig = Config.literal(...PROVIDERS)("STOCK_PROVIDER").pipe(
  Config.withDefault("fallback"),
);

export const portConfig = Config.integer("PORT").pipe(Config.withDefault(3000));

/** Sleep for the simulated answer time before replying. */
export const simulateLatencyConfig = Config.boolean("SIMULATE_LATENCY").pipe(
  Config.withDefault(true),
);

export const logLevelConfig = Config.logLevel("LOG_LEVEL").pipe(
  Config.withDefault(LogLevel.Info),
);

export const LoggingLive = Layer.unwrapEffect(
  Effect.map(logLevelConfig, (level) => Logger.minimumLogLevel(level)),
);
