// Circuit breaker: Effect shell.
//
// Wires the pure state machine (circuit-breaker-state.ts) to Effect's Ref,
// Clock, logging and interruption.

import { Clock, Data, Duration, Effect, Ref } from "effect";
import {
  type CircuitState,
  initialState,
  gate,
  onInterrupted,
  onNeutralFailure,
  onSuccess,
  onTrippableFailure,
} from "./circuit-breaker-state.ts";

export type { CircuitState } from "./circuit-breaker-state.ts";

// --- Config ---

export interface CircuitBreakerConfig<E> {
  readonly name?: string;
  readonly maxFailures: number;
  readonly resetTimeout: Duration.DurationInput;
  readonly isTrippable: (e: E) => boolean;
}

// --- Error ---

export class CircuitOpenError extends Data.TaggedError("CircuitOpenError")<{
  readonly message: string;
}> {}

// --- Circuit breaker ---

export interface BreakerStats {
  readonly name: string;
  readonly state: CircuitState;
  /** How many times the circuit has opened since start-up. */
  readonly trips: number;
}

export interface CircuitBreaker<E> {
  /** Run `effect` through the circuit breaker. Errors matching the
   *  `isTrippable` predicate (provided at construction) count toward the
   *  failure threshold. Non-trippable errors pass through unchanged. */
  readonly execute: <A, R>(
    effect: Effect.Effect<A, E, R>,
  ) => Effect.Effect<A, E | CircuitOpenError, R>;

  readonly state: Effect.Effect<CircuitState>;

  readonly stats: Effect.Effect<BreakerStats>;
}

export function makeCircuitBreaker<E>(
  config: CircuitBreakerConfig<E>,
): Effect.Effect<CircuitBreaker<E>> {
  return Effect.gen(function* () {
    const resetMs = Duration.toMillis(Duration.decode(config.resetTimeout));
    const { isTrippable, maxFailures } = config;
    const label = config.name ?? "cb";
    const ref = yield* Ref.make<CircuitState>(initialState);
    const trips = yield* Ref.make(0);

    const recordTrippable = Effect.gen(function* () {
      const now = yield* Clock.currentTimeMillis;
      const [prev, next] = yield* Ref.modify(ref, (s) => {
        const n = onTrippableFailure(s, now, maxFailures);
        return [[s, n] as const, n];
      });
      if (next._tag === "Open" && prev._tag !== "Open") {
        yield* Ref.update(trips, (n) => n + 1);
        yield* Effect.logWarning(`[${label}] circuit opened`);
      } else if (next._tag === "Closed") {
        yield* Effect.logDebug(`[${label}] failure ${next.failures}/${maxFailures}`);
      }
    });

    const execute = <A, R>(
      effect: Effect.Effect<A, E, R>,
    ): Effect.Effect<A, E | CircuitOpenError, R> =>
      Effect.gen(function* () {
        const now = yield* Clock.currentTimeMillis;
        const decision = yield* Ref.modify(ref, (s) => gate(s, now, resetMs));

        if (decision === "reject") {
          yield* Effect.logDebug(`[${label}] circuit open, rejecting`);
          return yield* Effect.fail(
            new CircuitOpenError({ message: "Circuit is open" }),
          );
        }

        if (decision === "probe") {
          yield* Effect.logDebug(`[${label}] half-open, allowing probe request`);
        }

        return yield* effect.pipe(
          Effect.tap(() => Ref.set(ref, onSuccess())),
          Effect.tapError((e) =>
            isTrippable(e) ? recordTrippable : Ref.update(ref, onNeutralFailure),
          ),
          Effect.onInterrupt(() =>
            Clock.currentTimeMillis.pipe(
              Effect.flatMap((at) => Ref.update(ref, (s) => onInterrupted(s, at))),
            ),
          ),
        );
      });

    return {
      execute,
      state: Ref.get(ref),
      stats: Effect.all({
        name: Effect.succeed(label),
        state: Ref.get(ref),
        trips: Ref.get(trips),
      }),
    } satisfies CircuitBreaker<E>;
  });
}
