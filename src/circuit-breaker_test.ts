// Integration tests for the Effect shell.
//
// The pure transitions are covered in circuit-breaker-state_test.ts. These
// tests verify the wiring: Ref updates, Clock usage, isTrippable filtering,
// interruption and statistics.

import assert from "node:assert/strict";
import { test } from "node:test";
import { Deferred, Effect, Either, Fiber, TestClock, TestContext } from "effect";
import {
  type CircuitState,
  CircuitOpenError,
  makeCircuitBreaker,
} from "./circuit-breaker.ts";

// --- Helpers ---

const trippable = (_: unknown) => true;

const defaultConfig = {
  name: "cb:test",
  maxFailures: 3,
  resetTimeout: "10 seconds",
  isTrippable: trippable,
} as const;

function run<A, E>(effect: Effect.Effect<A, E, never>): Promise<A> {
  return Effect.runPromise(effect.pipe(Effect.provide(TestContext.TestContext)));
}

function assertClosed(state: CircuitState, failures: number) {
  assert.equal(state._tag, "Closed");
  if (state._tag === "Closed") assert.equal(state.failures, failures);
}

// --- Tests ---

test("wiring: success flows through and resets state", async () => {
  const result = await run(
    Effect.gen(function* () {
      const cb = yield* makeCircuitBreaker(defaultConfig);
      yield* cb.execute(Effect.fail("err")).pipe(Effect.ignore);
      const value = yield* cb.execute(Effect.succeed(42));
      return { value, state: yield* cb.state };
    }),
  );

  assert.equal(result.value, 42);
  assertClosed(result.state, 0);
});

test("wiring: trippable failures open the circuit and count a trip", async () => {
  const stats = await run(
    Effect.gen(function* () {
      const cb = yield* makeCircuitBreaker(defaultConfig);
      for (let i = 0; i < 3; i++) {
        yield* cb.execute(Effect.fail("err")).pipe(Effect.ignore);
      }
      return yield* cb.stats;
    }),
  );

  assert.equal(stats.name, "cb:test");
  assert.equal(stats.state._tag, "Open");
  assert.equal(stats.trips, 1);
});

test("wiring: open circuit emits CircuitOpenError", async () => {
  const result = await run(
    Effect.gen(function* () {
      const cb = yield* makeCircuitBreaker(defaultConfig);
      for (let i = 0; i < 3; i++) {
        yield* cb.execute(Effect.fail("err")).pipe(Effect.ignore);
      }
      return yield* cb.execute(Effect.succeed("unreachable")).pipe(Effect.either);
    }),
  );

  assert.ok(Either.isLeft(result));
  if (Either.isLeft(result)) {
    assert.ok(result.left instanceof CircuitOpenError);
  }
});

test("wiring: non-trippable errors pass through without affecting state", async () => {
  const state = await run(
    Effect.gen(function* () {
      const cb = yield* makeCircuitBreaker({
        ...defaultConfig,
        isTrippable: (_: unknown) => false,
      });
      for (let i = 0; i < 5; i++) {
        yield* cb.execute(Effect.fail("err")).pipe(Effect.ignore);
      }
      return yield* cb.state;
    }),
  );

  assertClosed(state, 0);
});

test("wiring: clock integration, timeout elapses, probe resets to closed", async () => {
  const state = await run(
    Effect.gen(function* () {
      const cb = yield* makeCircuitBreaker(defaultConfig);
      for (let i = 0; i < 3; i++) {
        yield* cb.execute(Effect.fail("err")).pipe(Effect.ignore);
      }
      yield* TestClock.adjust("11 seconds");
      yield* cb.execute(Effect.succeed("probe"));
      return yield* cb.state;
    }),
  );

  assertClosed(state, 0);
});

test("wiring: a second request is rejected while the probe is in flight", async () => {
  const result = await run(
    Effect.gen(function* () {
      const cb = yield* makeCircuitBreaker(defaultConfig);
      for (let i = 0; i < 3; i++) {
        yield* cb.execute(Effect.fail("err")).pipe(Effect.ignore);
      }
      yield* TestClock.adjust("11 seconds");

      const release = yield* Deferred.make<void>();
      const started = yield* Deferred.make<void>();
      const probe = yield* Effect.fork(
        cb.execute(
          Deferred.succeed(started, undefined).pipe(
            Effect.zipRight(Deferred.await(release)),
            Effect.as("probe"),
          ),
        ),
      );
      yield* Deferred.await(started);

      const during = yield* cb.execute(Effect.succeed("second")).pipe(Effect.either);
      const stateDuring = yield* cb.state;

      yield* Deferred.succeed(release, undefined);
      const probeValue = yield* Fiber.join(probe);
      return { during, stateDuring, probeValue, after: yield* cb.state };
    }),
  );

  assert.ok(Either.isLeft(result.during));
  assert.equal(result.stateDuring._tag, "HalfOpen");
  assert.equal(result.probeValue, "probe");
  assertClosed(result.after, 0);
});

test("wiring: an interrupted probe re-opens the circuit", async () => {
  const state = await run(
    Effect.gen(function* () {
      const cb = yield* makeCircuitBreaker(defaultConfig);
      for (let i = 0; i < 3; i++) {
        yield* cb.execute(Effect.fail("err")).pipe(Effect.ignore);
      }
      yield* TestClock.adjust("11 seconds");

      const started = yield* Deferred.make<void>();
      const probe = yield* Effect.fork(
        cb.execute(
          Deferred.succeed(started, undefined).pipe(Effect.zipRight(Effect.never)),
        ),
      );
      yield* Deferred.await(started);
      yield* Fiber.interrupt(probe);
      return yield* cb.state;
    }),
  );

  assert.equal(state._tag, "Open");
});

test("wiring: a neutral failure settles the probe and closes the circuit", async () => {
  const state = await run(
    Effect.gen(function* () {
      const cb = yield* makeCircuitBreaker<string>({
        ...defaultConfig,
        isTrippable: (e) => e !== "not-found",
      });
      for (let i = 0; i < 3; i++) {
        yield* cb.execute(Effect.fail("down")).pipe(Effect.ignore);
      }
      yield* TestClock.adjust("11 seconds");
      yield* cb.execute(Effect.fail("not-found")).pipe(Effect.ignore);
      return yield* cb.state;
    }),
  );

  assertClosed(state, 0);
});
