// Demo data: static market fixtures served when no live provider answers,
// and a MarketData implementation backed only by them.

import { FileSystem } from "@effect/platform";
import { Config, Context, Data, Effect, Layer, Option, Schema } from "effect";
import { fileURLToPath } from "node:url";
import {
  type HistoryRange,
  type PriceHistory,
  normalizeSymbol,
  quoteFromBars,
  RANGE_DAYS,
} from "../domain.ts";
import { MarketData, SymbolNotFound } from "../market-data.ts";

// --- Fixture file schema ---

const PriceBarSchema = Schema.Struct({
  date: Schema.String,
  open: Schema.Number,
  high: Schema.Number,
  low: Schema.Number,
  close: Schema.Number,
  volume: Schema.Number,
});

const CompanyProfileSchema = Schema.Struct({
  symbol: Schema.String,
  name: Schema.String,
  exchange: Schema.String,
  currency: Schema.String,
  sector: Schema.optional(Schema.String),
  industry: Schema.optional(Schema.String),
});

export const DemoFixtureFile = Schema.Struct({
  asOf: Schema.String,
  tickers: Schema.Record({
    key: Schema.String,
    value: Schema.Struct({
      profile: CompanyProfileSchema,
      bars: Schema.NonEmptyArray(PriceBarSchema),
    }),
  }),
});

export type DemoFixtureFileType = typeof DemoFixtureFile.Type;

export class DemoDataError extends Data.TaggedError("DemoDataError")<{
  readonly message: string;
}> {}

// --- Service ---

export class DemoFixtures extends Context.Tag("DemoFixtures")<
  DemoFixtures,
  {
    readonly asOf: string;
    readonly symbols: readonly string[];
    /** The fixture for `symbol`, cut to the trading days of `range`. */
    readonly lookup: (
      symbol: string,
      range: HistoryRange,
    ) => Option.Option<PriceHistory>;
  }
>() {}

export function makeDemoFixtures(
  file: DemoFixtureFileType,
): Context.Tag.Service<DemoFixtures> {
  const lookup = (symbol: string, range: HistoryRange) =>
    Option.fromNullable(file.tickers[normalizeSymbol(symbol)]).pipe(
      Option.flatMap(({ profile, bars }) => {
        const window = bars.slice(-RANGE_DAYS[range]);
        return Option.fromNullable(
          quoteFromBars(profile.symbol, profile.currency, window),
        ).pipe(
          Option.map(
            (quote): PriceHistory => ({
              symbol: profile.symbol,
              range,
              quote,
              profile,
              bars: window,
            }),
          ),
        );
      }),
    );

  return DemoFixtures.of({
    asOf: file.asOf,
    symbols: Object.keys(file.tickers).sort(),
    lookup,
  });
}

export const defaultDemoDataPath = fileURLToPath(
  new URL("../../data/demo-market.json", import.meta.url),
);

export const loadDemoFixtures = (path: string) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const text = yield* fs.readFileString(path);
    const file = yield* Schema.decodeUnknown(Schema.parseJson(DemoFixtureFile))(text);
    yield* Effect.logDebug(
      `[demo] loaded ${Object.keys(file.tickers).length} fixtures as of ${file.asOf}`,
    );
    return makeDemoFixtures(file);
  }).pipe(
    Effect.catchTags({
      SystemError: (e) =>
        Effect.fail(new DemoDataError({ message: `Cannot read ${path}: ${e.message}` })),
      BadArgument: (e) =>
        Effect.fail(new DemoDataError({ message: `Cannot read ${path}: ${e.message}` })),
      ParseError: (e) =>
        Effect.fail(new DemoDataError({ message: `Invalid fixture file ${path}: ${e.message}` })),
    }),
  );

export const DemoFixturesLive = Layer.effect(
  DemoFixtures,
  Effect.gen(function* () {
    const path = yield* Config.string("DEMO_DATA_PATH").pipe(
      Config.withDefault(defaultDemoDataPath),
    );
    return yield* loadDemoFixtures(path);
  }),
);

// --- Demo-only MarketData layer ---

export const DemoMarketDataLive = Layer.effect(
  MarketData,
  Effect.gen(function* () {
    const fixtures = yield* DemoFixtures;

    const getHistory = (
      symbol: string,
      range: HistoryRange,
    ): Effect.Effect<PriceHistory, SymbolNotFound> =>
      Option.match(fixtures.lookup(symbol, range), {
        onNone: () => Effect.fail(new SymbolNotFound({ symbol })),
        onSome: Effect.succeed,
      });

    return MarketData.of({
      getQuote: (symbol: string) =>
        getHistory(symbol, "1mo").pipe(Effect.map((history) => history.quote)),
      getHistory,
    });
  }),
);
