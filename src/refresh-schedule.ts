// Refresh schedule: pure state machine.
//
// States:
//   Idle       → waiting; a tick starts a cycle once the interval has elapsed,
//                a manual request starts one immediately
//   Refreshing → a cycle is in flight; triggers are deferred, never run
//                alongside it
//
// This module contains only types and pure transition functions.

// --- State ---

export type Idle = {
  readonly _tag: "Idle";
  readonly lastSuccessfulRefresh: number | null;
};

export type Refreshing = {
  readonly _tag: "Refreshing";
  readonly startedAt: number;
  readonly lastSuccessfulRefresh: number | null;
  /** A manual request arrived mid-cycle and is owed one more cycle. */
  readonly pending: boolean;
};

export type RefreshState = Idle | Refreshing;

export const Idle = (lastSuccessfulRefresh: number | null): Idle => ({
  _tag: "Idle",
  lastSuccessfulRefresh,
});

export const Refreshing = (
  startedAt: number,
  lastSuccessfulRefresh: number | null,
  pending = false,
): Refreshing => ({
  _tag: "Refreshing",
  startedAt,
  lastSuccessfulRefresh,
  pending,
});

export const initialState: RefreshState = Idle(null);

// --- Transitions ---

export type Trigger = "tick" | "manual";
export type TriggerDecision = "start" | "wait" | "defer";

export function isDue(
  lastSuccessfulRefresh: number | null,
  now: number,
  intervalMs: number,
): boolean {
  return lastSuccessfulRefresh === null ||
    now - lastSuccessfulRefresh >= intervalMs;
}

/** Decide what a trigger does, and the resulting state. */
export function trigger(
  state: RefreshState,
  kind: Trigger,
  now: number,
  intervalMs: number,
): [TriggerDecision, RefreshState] {
  switch (state._tag) {
    case "Refreshing":
      // Ticks are dropped: the next tick re-checks the interval anyway.
      return kind === "manual" && !state.pending
        ? ["defer", Refreshing(state.startedAt, state.lastSuccessfulRefresh, true)]
        : ["defer", state];
    case "Idle":
      return kind === "manual" || isDue(state.lastSuccessfulRefresh, now, intervalMs)
        ? ["start", Refreshing(now, state.lastSuccessfulRefresh)]
        : ["wait", state];
  }
}

/** State after a cycle ends, whatever its per-symbol outcome. The flag
 *  says whether a deferred manual request is owed a follow-up cycle. */
export function complete(
  state: RefreshState,
  now: number,
): [boolean, RefreshState] {
  return [state._tag === "Refreshing" && state.pending, Idle(now)];
}
