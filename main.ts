#!/usr/bin/env -S npx tsx
import { Args, Command, Options, Prompt } from "@effect/cli";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import process from "node:process";
import { Console, Effect, Layer, Option } from "effect";
import { LoggingLive, portConfig } from "./src/config.ts";
import { DEFAULT_RANGE, HISTORY_RANGES } from "./src/domain.ts";
import { formatError, formatSnapshot } from "./src/format.ts";
import { DashboardLive } from "./src/layers.ts";
import type { MarketDataError } from "./src/market-data.ts";
import { loadSnapshot } from "./src/market-snapshot.ts";
import {
  askQuestion,
  HttpLive,
  optionalSnapshot,
  ServerSettingsLive,
} from "./src/server.ts";

// --- serve ---

const port = Options.integer("port").pipe(
  Options.withDescription("HTTP port (defaults to $PORT or 3000)"),
  Options.optional,
);

const serve = Command.make("serve", { port }, ({ port }) =>
  Effect.gen(function* () {
    const resolved = Option.isSome(port) ? port.value : yield* portConfig;
    return yield* Layer.launch(HttpLive(resolved));
  }),
).pipe(Command.withDescription("Start the dashboard web server"));

// --- quote ---

const symbol = Options.text("symbol").pipe(
  Options.withDescription("Stock ticker symbol (e.g. AAPL, GOOGL, TSLA)"),
  Options.withFallbackPrompt(
    Prompt.text({
      message: "Enter a stock symbol:",
      validate: (value) =>
        value.trim().length === 0
          ? Effect.fail("Symbol cannot be empty")
          : Effect.succeed(value.trim()),
    }),
  ),
);

const range = Options.choice("range", HISTORY_RANGES).pipe(
  Options.withDescription("Price history range"),
  Options.withDefault(DEFAULT_RANGE),
);

const quote = Command.make("quote", { symbol, range }, ({ symbol, range }) =>
  Effect.gen(function* () {
    const snapshot = yield* loadSnapshot(symbol, range);
    yield* Console.log(formatSnapshot(snapshot));
  }),
).pipe(Command.withDescription("Print a quote and market insight for a ticker"));

// --- ask ---

const question = Args.text({ name: "question" }).pipe(
  Args.withDescription("Question about the business or market data"),
);

const context = Options.text("symbol").pipe(
  Options.withDescription("Ticker to use for market questions"),
  Options.optional,
);

const ask = Command.make("ask", { question, symbol: context }, ({ question, symbol }) =>
  Effect.gen(function* () {
    const snapshot = yield* optionalSnapshot(Option.getOrUndefined(symbol));
    const conversation = yield* askQuestion(question, snapshot);
    yield* Console.log(conversation.answer);
  }),
).pipe(Command.withDescription("Ask the conversational reports assistant"));

// --- Run ---

const command = Command.make("market-dashboard").pipe(
  Command.withSubcommands([serve, quote, ask]),
);

const cli = Command.run(command, {
  name: "market-dashboard",
  version: "0.1.0",
});

const logMarketError = (e: MarketDataError) => Console.error(formatError(e));

cli(process.argv).pipe(
  Effect.catchTags({
    NetworkError: logMarketError,
    HttpError: logMarketError,
    ParseError: logMarketError,
    SymbolNotFound: logMarketError,
    ServiceError: logMarketError,
    EmptyQuery: () => Console.error("Please enter a question."),
  }),
  Effect.provide(Layer.mergeAll(DashboardLive, ServerSettingsLive)),
  Effect.provide(LoggingLive),
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain,
);
