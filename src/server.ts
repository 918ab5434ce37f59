// HTTP dashboard: server-rendered pages plus a small JSON API.

import {
  FileSystem,
  HttpMiddleware,
  HttpRouter,
  HttpServer,
  HttpServerRequest,
  HttpServerResponse,
} from "@effect/platform";
import { NodeHttpServer } from "@effect/platform-node";
import { Context, Duration, Effect, Layer, Option, Schema } from "effect";
import { createServer } from "node:http";
import { createRequire } from "node:module";
import { dirname, join } from "node:path";
import { sampleAnalytics } from "./analytics.ts";
import { type Conversation, ConversationLog } from "./conversations.ts";
import {
  DEFAULT_RANGE,
  HISTORY_RANGES,
  type HistoryRange,
  type MarketSnapshot,
} from "./domain.ts";
import { simulateLatencyConfig } from "./config.ts";
import { classifyError } from "./format.ts";
import type { QueryContext } from "./insights.ts";
import { describeError, type MarketDataError } from "./market-data.ts";
import { ProviderHealth } from "./market-data-fallback.ts";
import { MarketSnapshots } from "./market-snapshot.ts";
import {
  anomaliesPage,
  executivePage,
  marketPage,
  pipelinesPage,
  reportsPage,
} from "./pages.ts";
import { DemoFixtures } from "./providers/demo-data.ts";
import { anomalyBaseline, revenueTrend } from "./simulation.ts";

/** Year the simulated revenue and anomaly series cover. */
const SAMPLE_YEAR = 2024;

const EMPTY_QUESTION = "Please enter a question.";

export class ServerSettings extends Context.Tag("ServerSettings")<
  ServerSettings,
  {
    /** Wait for the simulated response time before answering a question. */
    readonly simulateLatency: boolean;
  }
>() {}

// --- Responses ---

const htmlResponse = (body: string, status = 200) =>
  Effect.succeed(
    HttpServerResponse.text(body, { status, contentType: "text/html; charset=utf-8" }),
  );

const jsonResponse = (body: unknown, status = 200) =>
  Effect.succeed(HttpServerResponse.unsafeJson(body, { status }));

const textResponse = (body: string, status: number) =>
  Effect.succeed(HttpServerResponse.text(body, { status }));

export function statusFor(error: MarketDataError): number {
  switch (error._tag) {
    case "SymbolNotFound":
      return 404;
    case "HttpError":
      return error.status === 404 ? 404 : 502;
    default:
      return 502;
  }
}

// --- Request schemas ---

const RangeParam = Schema.optional(Schema.Literal(...HISTORY_RANGES));

const MarketQuery = Schema.Struct({
  symbol: Schema.optional(Schema.String),
  range: RangeParam,
});

const SymbolPath = Schema.Struct({ symbol: Schema.String });

const SnapshotQuery = Schema.Struct({
  symbol: Schema.String,
  range: RangeParam,
});

const AskBody = Schema.Struct({
  query: Schema.String,
  symbol: Schema.optional(Schema.String),
});

const ReportForm = Schema.Struct({
  query: Schema.String,
  symbol: Schema.optional(Schema.String),
});

// --- Shared steps ---

/** Answer a question, waiting out its simulated response time when
 *  latency simulation is on. */
export const askQuestion = (query: string, snapshot: Option.Option<MarketSnapshot>) =>
  Effect.gen(function* () {
    const log = yield* ConversationLog;
    const { simulateLatency } = yield* ServerSettings;
    const context: QueryContext = Option.match(snapshot, {
      onNone: () => ({ analytics: sampleAnalytics }),
      onSome: (s) => ({ analytics: sampleAnalytics, snapshot: s }),
    });
    const conversation = yield* log.ask(query, context);
    if (simulateLatency) {
      yield* Effect.sleep(Duration.seconds(conversation.responseTime));
    }
    return conversation;
  });

/** Market context for a question; a ticker that cannot be loaded just
 *  leaves the answer without it. */
export const optionalSnapshot = (symbol: string | undefined) =>
  symbol === undefined || symbol.trim() === ""
    ? Effect.succeedNone
    : Effect.flatMap(MarketSnapshots, (s) => s.load(symbol, DEFAULT_RANGE)).pipe(
        Effect.tapError((e) =>
          Effect.logWarning(`[ask] no market context: ${describeError(e)}`),
        ),
        Effect.option,
      );

const reportsView = (latest?: Conversation, error?: string) =>
  Effect.gen(function* () {
    const log = yield* ConversationLog;
    return {
      recent: yield* log.recent(),
      stats: yield* log.stats,
      ...(latest === undefined ? {} : { latest }),
      ...(error === undefined ? {} : { error }),
    };
  });

const reportsHtml = (latest?: Conversation, error?: string, status = 200) =>
  Effect.flatMap(reportsView(latest, error), (view) =>
    htmlResponse(reportsPage(view), status),
  );

const conversationJson = (c: Conversation) => ({
  ...c,
  timestamp: new Date(c.timestamp).toISOString(),
});

/** Load a snapshot and answer with `render(snapshot)` as JSON, or with the
 *  error and its status code. */
const loadJson = (
  symbol: string,
  range: HistoryRange,
  render: (snapshot: MarketSnapshot) => unknown,
) =>
  Effect.flatMap(MarketSnapshots, (s) => s.load(symbol, range)).pipe(
    Effect.flatMap((snapshot) => jsonResponse(render(snapshot))),
    Effect.catchAll((e) => jsonResponse({ error: describeError(e) }, statusFor(e))),
  );

// --- Chart.js bundle ---

const CHART_BUNDLES = ["chart.umd.js", "chart.umd.min.js"];

/** The browser build of Chart.js shipped in node_modules. */
export const chartJsBundle = Effect.gen(function* () {
  const fs = yield* FileSystem.FileSystem;
  const dist = dirname(createRequire(import.meta.url).resolve("chart.js"));
  for (const name of CHART_BUNDLES) {
    const path = join(dist, name);
    if (yield* fs.exists(path)) return Option.some(path);
  }
  return Option.none<string>();
});

// --- Routes ---

export const router = HttpRouter.empty.pipe(
  HttpRouter.get("/", Effect.succeed(HttpServerResponse.redirect("/market"))),

  HttpRouter.get(
    "/market",
    Effect.gen(function* () {
      const fixtures = yield* DemoFixtures;
      const params = yield* HttpRouter.schemaParams(MarketQuery);
      const symbol = params.symbol ?? fixtures.symbols[0] ?? "AAPL";
      const range = params.range ?? DEFAULT_RANGE;
      const view = { symbols: fixtures.symbols, symbol, range };

      return yield* Effect.flatMap(MarketSnapshots, (s) => s.load(symbol, range)).pipe(
        Effect.flatMap((snapshot) => htmlResponse(marketPage({ ...view, snapshot }))),
        Effect.catchAll((e) =>
          htmlResponse(marketPage({ ...view, error: classifyError(e) }), statusFor(e)),
        ),
      );
    }).pipe(
      Effect.catchTag("ParseError", () =>
        htmlResponse(
          marketPage({
            symbols: [],
            symbol: "",
            range: DEFAULT_RANGE,
            error: {
              title: "Invalid request",
              hint: `Expected a single symbol and a range of ${HISTORY_RANGES.join(", ")}.`,
            },
          }),
          400,
        ),
      ),
    ),
  ),

  HttpRouter.get(
    "/executive",
    Effect.gen(function* () {
      const revenue = yield* revenueTrend(sampleAnalytics.kpis.totalRevenue, SAMPLE_YEAR);
      return yield* htmlResponse(executivePage(sampleAnalytics.kpis, revenue));
    }),
  ),

  HttpRouter.get("/reports", reportsHtml()),

  HttpRouter.post(
    "/reports",
    Effect.gen(function* () {
      const form = yield* HttpServerRequest.schemaBodyUrlParams(ReportForm);
      const snapshot = yield* optionalSnapshot(form.symbol);
      const conversation = yield* askQuestion(form.query, snapshot);
      return yield* reportsHtml(conversation);
    }).pipe(
      Effect.catchTags({
        EmptyQuery: () => reportsHtml(undefined, EMPTY_QUESTION, 400),
        ParseError: () => reportsHtml(undefined, EMPTY_QUESTION, 400),
        RequestError: (e) =>
          reportsHtml(undefined, `Could not read the form: ${e.message}`, 400),
      }),
    ),
  ),

  HttpRouter.get(
    "/anomalies",
    Effect.gen(function* () {
      const baseline = yield* anomalyBaseline(SAMPLE_YEAR);
      return yield* htmlResponse(anomaliesPage(sampleAnalytics.anomalies, baseline));
    }),
  ),

  HttpRouter.get(
    "/pipelines",
    htmlResponse(pipelinesPage(sampleAnalytics.pipelines)),
  ),

  HttpRouter.get(
    "/assets/chart.js",
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const bundle = yield* chartJsBundle;
      if (Option.isNone(bundle)) {
        return yield* textResponse("Chart.js bundle not found", 404);
      }
      const source = yield* fs.readFileString(bundle.value);
      return HttpServerResponse.text(source, {
        contentType: "text/javascript; charset=utf-8",
        headers: { "cache-control": "public, max-age=86400" },
      });
    }).pipe(
      Effect.catchTags({
        SystemError: (e) => textResponse(e.message, 500),
        BadArgument: (e) => textResponse(e.message, 500),
      }),
    ),
  ),

  // --- JSON API ---

  HttpRouter.get(
    "/api/snapshot/:symbol",
    HttpRouter.schemaParams(SnapshotQuery).pipe(
      Effect.flatMap(({ symbol, range }) =>
        loadJson(symbol, range ?? DEFAULT_RANGE, (snapshot) => snapshot),
      ),
      Effect.catchTag("ParseError", () =>
        jsonResponse({ error: `range must be one of ${HISTORY_RANGES.join(", ")}` }, 400),
      ),
    ),
  ),

  HttpRouter.get(
    "/api/quote/:symbol",
    HttpRouter.schemaPathParams(SymbolPath).pipe(
      Effect.flatMap(({ symbol }) =>
        loadJson(symbol, "1mo", (snapshot) => ({
          quote: snapshot.history.quote,
          profile: snapshot.history.profile,
          source: snapshot.source,
          ...(snapshot.failure === undefined ? {} : { failure: snapshot.failure }),
        })),
      ),
      Effect.catchTag("ParseError", (e) => jsonResponse({ error: e.message }, 400)),
    ),
  ),

  HttpRouter.post(
    "/api/ask",
    Effect.gen(function* () {
      const body = yield* HttpServerRequest.schemaBodyJson(AskBody);
      const snapshot = yield* optionalSnapshot(body.symbol);
      const conversation = yield* askQuestion(body.query, snapshot);
      return yield* jsonResponse(conversationJson(conversation));
    }).pipe(
      Effect.catchTags({
        EmptyQuery: () => jsonResponse({ error: "query must not be empty" }, 400),
        ParseError: () => jsonResponse({ error: "expected a JSON body { query: string }" }, 400),
        RequestError: (e) => jsonResponse({ error: e.message }, 400),
      }),
    ),
  ),

  HttpRouter.get(
    "/api/conversations",
    Effect.gen(function* () {
      const log = yield* ConversationLog;
      const recent = yield* log.recent();
      return yield* jsonResponse({
        conversations: recent.map(conversationJson),
        stats: yield* log.stats,
      });
    }),
  ),

  HttpRouter.get(
    "/api/health",
    Effect.gen(function* () {
      const health = yield* ProviderHealth;
      const fixtures = yield* DemoFixtures;
      return yield* jsonResponse({
        status: "ok",
        providers: health.providers,
        breakers: yield* health.breakers,
        demo: { asOf: fixtures.asOf, symbols: fixtures.symbols },
      });
    }),
  ),
);

// --- Server ---

export const HttpLive = (port: number) =>
  router.pipe(
    HttpServer.serve(HttpMiddleware.logger),
    HttpServer.withLogAddress,
    Layer.provide(NodeHttpServer.layer(createServer, { port })),
  );

export const ServerSettingsLive = Layer.effect(
  ServerSettings,
  Effect.map(simulateLatencyConfig, (simulateLatency) =>
    ServerSettings.of({ simulateLatency }),
  ),
);
