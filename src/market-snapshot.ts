// Market snapshots: one live data call with timeout and retry, masked by
// the demo fixture when the call fails.

import {
  Config,
  Context,
  Duration,
  Effect,
  Layer,
  Option,
  Schedule,
} from "effect";
import {
  type DataSource,
  type HistoryRange,
  type MarketSnapshot,
  normalizeSymbol,
  type PriceHistory,
} from "./domain.ts";
import { providerConfig } from "./config.ts";
import { computeMetrics } from "./indicators.ts";
import { marketInsight } from "./insights.ts";
import {
  describeError,
  MarketData,
  type MarketDataError,
  NetworkError,
  SymbolNotFound,
} from "./market-data.ts";
import { DemoFixtures } from "./providers/demo-data.ts";

// --- Policy ---

export interface FetchPolicy {
  /** Upper bound for a single attempt. */
  readonly timeout: Duration.DurationInput;
  /** Retries after the first attempt, for network errors only. */
  readonly retries: number;
  /** First backoff delay; doubles on every retry. */
  readonly backoff: Duration.DurationInput;
}

export const fetchPolicyConfig: Config.Config<FetchPolicy> = Config.all({
  timeout: Config.duration("REQUEST_TIMEOUT").pipe(
    Config.withDefault(Duration.seconds(10)),
  ),
  retries: Config.integer("REQUEST_RETRIES").pipe(Config.withDefault(2)),
  backoff: Config.succeed(Duration.seconds(1)),
});

// --- Pure assembly ---

export function buildSnapshot(
  history: PriceHistory,
  source: DataSource,
  failure?: string,
): MarketSnapshot {
  const metrics = computeMetrics(history.bars);
  return {
    symbol: history.symbol,
    range: history.range,
    history,
    metrics,
    insight: marketInsight(history.symbol, history.range, metrics),
    source,
    ...(failure === undefined ? {} : { failure }),
  };
}

// --- Service ---

export class MarketSnapshots extends Context.Tag("MarketSnapshots")<
  MarketSnapshots,
  {
    /** Live snapshot, or the demo fixture when the live call fails and the
     *  ticker has one. Fails only for tickers without a fixture. */
    readonly load: (
      symbol: string,
      range: HistoryRange,
    ) => Effect.Effect<MarketSnapshot, MarketDataError>;
  }
>() {}

/** `source` labels snapshots the provider answered; it is "demo" when the
 *  configured provider itself serves the fixtures. */
export const makeMarketSnapshots = (policy: FetchPolicy, source: DataSource = "live") =>
  Effect.gen(function* () {
    const api = yield* MarketData;
    const fixtures = yield* DemoFixtures;

    const fetchLive = (symbol: string, range: HistoryRange) =>
      api.getHistory(symbol, range).pipe(
        Effect.timeoutFail({
          duration: policy.timeout,
          onTimeout: () => new NetworkError({ message: "Request timed out" }),
        }),
        Effect.retry({
          while: (e) => e._tag === "NetworkError",
          schedule: Schedule.exponential(policy.backoff).pipe(
            Schedule.compose(Schedule.recurs(policy.retries)),
          ),
        }),
      );

    const load = (rawSymbol: string, range: HistoryRange) => {
      const symbol = normalizeSymbol(rawSymbol);
      if (symbol.length === 0) {
        return Effect.fail(new SymbolNotFound({ symbol }));
      }

      return fetchLive(symbol, range).pipe(
        Effect.map((history) => buildSnapshot(history, source)),
        Effect.catchAll((e) =>
          Option.match(fixtures.lookup(symbol, range), {
            onNone: () => Effect.fail(e),
            onSome: (history) =>
              Effect.logWarning(
                `[snapshot] live data unavailable, serving demo data: ${describeError(e)}`,
              ).pipe(
                Effect.as(buildSnapshot(history, "demo", describeError(e))),
              ),
          }),
        ),
        Effect.annotateLogs({ symbol, range }),
      );
    };

    return MarketSnapshots.of({ load });
  });

export const MarketSnapshotsLive = Layer.effect(
  MarketSnapshots,
  Effect.flatMap(
    Config.all([fetchPolicyConfig, providerConfig]),
    ([policy, provider]) =>
      makeMarketSnapshots(policy, provider === "demo" ? "demo" : "live"),
  ),
);

export const loadSnapshot = (symbol: string, range: HistoryRange) =>
  Effect.flatMap(MarketSnapshots, (snapshots) => snapshots.load(symbol, range));
