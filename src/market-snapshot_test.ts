import assert from "node:assert/strict";
import { test } from "node:test";
import { NodeContext } from "@effect/platform-node";
import { type Context, Effect, Either, Logger, LogLevel, Option } from "effect";
import { HISTORY_RANGES, type PriceHistory } from "./domain.ts";
import {
  HttpError,
  MarketData,
  type MarketDataError,
  NetworkError,
  SymbolNotFound,
} from "./market-data.ts";
import { buildSnapshot, type FetchPolicy, makeMarketSnapshots } from "./market-snapshot.ts";
import {
  defaultDemoDataPath,
  DemoFixtures,
  loadDemoFixtures,
  makeDemoFixtures,
} from "./providers/demo-data.ts";

// --- Helpers ---

const fixtures = makeDemoFixtures({
  asOf: "2025-06-13",
  tickers: {
    AAPL: {
      profile: { symbol: "AAPL", name: "Apple Inc.", exchange: "NasdaqGS", currency: "USD" },
      bars: [
        { date: "2025-06-11", open: 99, high: 101, low: 98, close: 100, volume: 1000 },
        { date: "2025-06-12", open: 100, high: 103, low: 99, close: 102, volume: 1200 },
        { date: "2025-06-13", open: 102, high: 102, low: 100, close: 101, volume: 900 },
      ],
    },
  },
});

const policy: FetchPolicy = { timeout: "1 second", retries: 2, backoff: "1 millis" };

const liveHistory: PriceHistory = {
  symbol: "MSFT",
  range: "1mo",
  quote: {
    symbol: "MSFT",
    price: 150,
    change: 50,
    changePercent: 50,
    currency: "USD",
    timestamp: 0,
  },
  profile: { symbol: "MSFT", name: "Microsoft", exchange: "NasdaqGS", currency: "USD" },
  bars: [
    { date: "2025-06-12", open: 100, high: 100, low: 100, close: 100, volume: 10 },
    { date: "2025-06-13", open: 150, high: 150, low: 150, close: 150, volume: 30 },
  ],
};

interface FakeProvider {
  readonly calls: string[];
  readonly api: Context.Tag.Service<MarketData>;
}

function provider(result: (symbol: string) => Effect.Effect<PriceHistory, MarketDataError>): FakeProvider {
  const calls: string[] = [];
  const getHistory = (symbol: string) => {
    calls.push(symbol);
    return result(symbol);
  };
  return {
    calls,
    api: MarketData.of({
      getHistory,
      getQuote: (symbol) => Effect.map(getHistory(symbol), (h) => h.quote),
    }),
  };
}

const load = (fake: FakeProvider, symbol: string) =>
  Effect.runPromise(
    makeMarketSnapshots(policy).pipe(
      Effect.flatMap((snapshots) => Effect.either(snapshots.load(symbol, "1mo"))),
      Effect.provideService(MarketData, fake.api),
      Effect.provideService(DemoFixtures, fixtures),
      Logger.withMinimumLogLevel(LogLevel.None),
    ),
  );

// --- Live path ---

test("load: a live answer is tagged live with no failure", async () => {
  const fake = provider(() => Effect.succeed(liveHistory));
  const result = await load(fake, "MSFT");

  assert.ok(Either.isRight(result));
  if (Either.isRight(result)) {
    assert.equal(result.right.source, "live");
    assert.equal("failure" in result.right, false);
    assert.equal(result.right.metrics.periodReturn, 50);
    assert.equal(result.right.metrics.averageVolume, 20);
  }
});

test("load: the ticker is trimmed and upper-cased before the call", async () => {
  const fake = provider(() => Effect.succeed(liveHistory));
  await load(fake, "  msft ");
  assert.deepEqual(fake.calls, ["MSFT"]);
});

test("load: a blank ticker fails without calling the provider", async () => {
  const fake = provider(() => Effect.succeed(liveHistory));
  const result = await load(fake, "   ");

  assert.ok(Either.isLeft(result));
  if (Either.isLeft(result)) {
    assert.equal(result.left._tag, "SymbolNotFound");
    assert.equal(result.left._tag === "SymbolNotFound" && result.left.symbol, "");
  }
  assert.deepEqual(fake.calls, []);
});

// --- Demo substitution ---

test("load: network errors are retried, then the fixture is served", async () => {
  const fake = provider(() => Effect.fail(new NetworkError({ message: "down" })));
  const result = await load(fake, "AAPL");

  assert.equal(fake.calls.length, 3);
  assert.ok(Either.isRight(result));
  if (Either.isRight(result)) {
    assert.equal(result.right.source, "demo");
    assert.equal(result.right.failure, "NetworkError: down");
    assert.deepEqual(
      Option.some(result.right.history),
      fixtures.lookup("AAPL", "1mo"),
    );
  }
});

test("load: a non-network failure is not retried but still masked", async () => {
  const fake = provider(() => Effect.fail(new HttpError({ status: 404 })));
  const result = await load(fake, "aapl");

  assert.equal(fake.calls.length, 1);
  assert.ok(Either.isRight(result));
  if (Either.isRight(result)) {
    assert.equal(result.right.source, "demo");
    assert.equal(result.right.failure, "HTTP 404");
    assert.equal(result.right.history.quote.price, 101);
  }
});

test("load: a slow provider times out and falls back to the fixture", async () => {
  const fake = provider(() => Effect.never);
  const result = await Effect.runPromise(
    makeMarketSnapshots({ timeout: "5 millis", retries: 0, backoff: "1 millis" }).pipe(
      Effect.flatMap((snapshots) => Effect.either(snapshots.load("AAPL", "1mo"))),
      Effect.provideService(MarketData, fake.api),
      Effect.provideService(DemoFixtures, fixtures),
      Logger.withMinimumLogLevel(LogLevel.None),
    ),
  );

  assert.ok(Either.isRight(result));
  if (Either.isRight(result)) {
    assert.equal(result.right.failure, "NetworkError: Request timed out");
  }
});

test("load: without a fixture the provider error propagates", async () => {
  const fake = provider((symbol) => Effect.fail(new SymbolNotFound({ symbol })));
  const result = await load(fake, "ZZZZ");

  assert.ok(Either.isLeft(result));
  if (Either.isLeft(result)) {
    assert.equal(result.left._tag, "SymbolNotFound");
  }
});

// --- buildSnapshot ---

test("buildSnapshot: the insight is derived from the metrics", () => {
  const snapshot = buildSnapshot(liveHistory, "live");
  assert.equal(
    snapshot.insight,
    "🚀 MSFT is up 50.0% over the last month, a strong rally. Volatility is low at 0.0% annualised, and the price sits 20.0% above its 2-day average. Momentum remains intact.",
  );
});

test("load: a failed live call yields the bundled fixture for every ticker and range", async () => {
  const down = provider(() => Effect.fail(new NetworkError({ message: "down" })));
  const bundled = await Effect.runPromise(
    loadDemoFixtures(defaultDemoDataPath).pipe(Effect.provide(NodeContext.layer)),
  );
  const pairs = bundled.symbols.flatMap((symbol) =>
    HISTORY_RANGES.map((range) => ({ symbol, range })),
  );
  const snapshots = await Effect.runPromise(
    makeMarketSnapshots({ ...policy, retries: 0 }).pipe(
      Effect.flatMap((s) =>
        Effect.forEach(pairs, ({ symbol, range }) => s.load(symbol, range)),
      ),
      Effect.provideService(MarketData, down.api),
      Effect.provideService(DemoFixtures, bundled),
      Logger.withMinimumLogLevel(LogLevel.None),
    ),
  );

  assert.deepEqual(bundled.symbols, ["AAPL", "AMZN", "GOOGL", "MSFT", "TSLA"]);
  assert.equal(snapshots.length, 5 * HISTORY_RANGES.length);
  pairs.forEach(({ symbol, range }, i) => {
    const snapshot = snapshots[i];
    assert.equal(snapshot?.source, "demo");
    assert.equal(snapshot?.failure, "NetworkError: down");
    assert.deepEqual(Option.fromNullable(snapshot?.history), bundled.lookup(symbol, range));
  });
});
