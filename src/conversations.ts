// Conversational reports: an in-memory log of questions and the canned
// answers they received.

import { Clock, Context, Data, Effect, Layer, Ref } from "effect";
import { answerQuery, type QueryContext } from "./insights.ts";
import { simulatedResponse } from "./simulation.ts";

export interface Conversation {
  readonly timestamp: number; // epoch ms
  readonly query: string;
  readonly answer: string;
  readonly responseTime: number; // seconds
  readonly satisfaction: number; // stars
}

export interface ConversationStats {
  readonly total: number;
  readonly averageResponseTime: number;
  readonly averageSatisfaction: number;
}

export class EmptyQuery extends Data.TaggedError("EmptyQuery")<{}> {}

export const HISTORY_LIMIT = 10;

export class ConversationLog extends Context.Tag("ConversationLog")<
  ConversationLog,
  {
    readonly ask: (
      query: string,
      context: QueryContext,
    ) => Effect.Effect<Conversation, EmptyQuery>;
    /** Newest first. */
    readonly recent: (limit?: number) => Effect.Effect<readonly Conversation[]>;
    readonly stats: Effect.Effect<ConversationStats>;
  }
>() {}

/** The newest `HISTORY_LIMIT` conversations plus running sums over all of them. */
export interface LogState {
  readonly window: readonly Conversation[];
  readonly total: number;
  readonly responseTimeSum: number;
  readonly satisfactionSum: number;
}

export const emptyLog: LogState = {
  window: [],
  total: 0,
  responseTimeSum: 0,
  satisfactionSum: 0,
};

export function record(state: LogState, conversation: Conversation): LogState {
  const window = [...state.window, conversation];
  return {
    window: window.length > HISTORY_LIMIT ? window.slice(-HISTORY_LIMIT) : window,
    total: state.total + 1,
    responseTimeSum: state.responseTimeSum + conversation.responseTime,
    satisfactionSum: state.satisfactionSum + conversation.satisfaction,
  };
}

export function computeStats(state: LogState): ConversationStats {
  const { total } = state;
  if (total === 0) {
    return { total, averageResponseTime: 0, averageSatisfaction: 0 };
  }
  return {
    total,
    averageResponseTime: state.responseTimeSum / total,
    averageSatisfaction: state.satisfactionSum / total,
  };
}

/** "YYYY-MM-DD HH:MM:SS" in UTC. */
export function formatTimestamp(epochMs: number): string {
  return new Date(epochMs).toISOString().replace("T", " ").slice(0, 19);
}

/** Collapsed-row title: the first 50 characters of the query. */
export function historyTitle(conversation: Conversation): string {
  return `Query: ${conversation.query.slice(0, 50)}... - ${formatTimestamp(conversation.timestamp)}`;
}

export const makeConversationLog = Effect.gen(function* () {
  const ref = yield* Ref.make(emptyLog);

  const ask = (query: string, context: QueryContext) =>
    Effect.gen(function* () {
      const trimmed = query.trim();
      if (trimmed.length === 0) return yield* Effect.fail(new EmptyQuery());

      const { responseTime, satisfaction } = yield* simulatedResponse;
      const conversation: Conversation = {
        timestamp: yield* Clock.currentTimeMillis,
        query: trimmed,
        answer: answerQuery(trimmed, context),
        responseTime,
        satisfaction,
      };
      yield* Ref.update(ref, (state) => record(state, conversation));
      yield* Effect.logDebug(`[conversations] answered "${trimmed.slice(0, 50)}"`);
      return conversation;
    });

  return ConversationLog.of({
    ask,
    recent: (limit = HISTORY_LIMIT) =>
      Ref.get(ref).pipe(
        Effect.map(({ window }) => window.slice(-limit).reverse()),
      ),
    stats: Ref.get(ref).pipe(Effect.map(computeStats)),
  });
});

export const ConversationLogLive = Layer.effect(ConversationLog, makeConversationLog);
