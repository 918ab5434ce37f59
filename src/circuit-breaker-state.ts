// Circuit breaker: pure state machine.
//
// States:
//   Closed   → requests flow through, trippable failures are counted
//   Open     → requests rejected until the reset timeout elapses
//   HalfOpen → exactly one probe is in flight; everything else is rejected
//              until it settles (success or healthy answer → Closed,
//              trippable failure or interruption → Open)
//
// Only types and pure transition functions live here.

// --- State ---

export type Closed = { readonly _tag: "Closed"; readonly failures: number };
export type Open = { readonly _tag: "Open"; readonly openedAt: number };
export type HalfOpen = { readonly _tag: "HalfOpen" };

export type CircuitState = Closed | Open | HalfOpen;

export const Closed = (failures: number): Closed => ({
  _tag: "Closed",
  failures,
});

export const Open = (openedAt: number): Open => ({
  _tag: "Open",
  openedAt,
});

export const HalfOpen: HalfOpen = { _tag: "HalfOpen" };

export const initialState: CircuitState = Closed(0);

// --- Transitions ---

export type GateDecision = "allow" | "probe" | "reject";

/** Decide whether to let a request through, and the resulting state. */
export function gate(
  state: CircuitState,
  now: number,
  resetMs: number,
): [GateDecision, CircuitState] {
  switch (state._tag) {
    case "Closed":
      return ["allow", state];
    case "HalfOpen":
      return ["reject", state];
    case "Open":
      return now - state.openedAt >= resetMs
        ? ["probe", HalfOpen]
        : ["reject", state];
  }
}

/** State after a successful execution. */
export function onSuccess(): CircuitState {
  return Closed(0);
}

/** State after a failure that says nothing about provider health
 *  (e.g. an unknown symbol). It still settles a pending probe. */
export function onNeutralFailure(state: CircuitState): CircuitState {
  return state._tag === "HalfOpen" ? Closed(0) : state;
}

/** State after a trippable failure. */
export function onTrippableFailure(
  state: CircuitState,
  now: number,
  maxFailures: number,
): CircuitState {
  switch (state._tag) {
    case "HalfOpen":
      return Open(now);
    case "Closed": {
      const next = state.failures + 1;
      return next >= maxFailures ? Open(now) : Closed(next);
    }
    case "Open":
      return state;
  }
}

/** State after the probe was interrupted before it settled. */
export function onInterrupted(state: CircuitState, now: number): CircuitState {
  return state._tag === "HalfOpen" ? Open(now) : state;
}
