// Polling loop: drives the coordinator from a timer, independent of
// whatever renders the results.

import { type Duration, Effect, Option, Schedule } from "effect";
import { type CycleReport, RefreshCoordinator } from "./refresh-coordinator.ts";

export interface DashboardLoopOptions<R> {
  readonly symbols: ReadonlyArray<string>;
  readonly autoRefresh: boolean;
  /** How often the elapsed-time check runs. Defaults to one second. */
  readonly pollEvery?: Duration.DurationInput;
  readonly onCycle: (report: CycleReport) => Effect.Effect<void, never, R>;
}

/** Refresh once, then (with auto-refresh on) keep ticking until
 *  interrupted. */
export const runDashboard = <R>(options: DashboardLoopOptions<R>) =>
  Effect.gen(function* () {
    const coordinator = yield* RefreshCoordinator;

    const handle = (result: Option.Option<CycleReport>) =>
      Option.match(result, {
        onNone: () => Effect.void,
        onSome: options.onCycle,
      });

    yield* coordinator.runRefreshCycle(options.symbols).pipe(
      Effect.flatMap(handle),
    );
    if (!options.autoRefresh) return;

    yield* coordinator.tick(options.symbols).pipe(
      Effect.flatMap(handle),
      Effect.repeat(Schedule.spaced(options.pollEvery ?? "1 second")),
    );
  });
