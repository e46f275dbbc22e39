import type { Done, Fail, OutcomeMeta } from "./outcome";
import type { Failure } from "./failure";
import { failure, errorMessage } from "./failure";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export function fail(f: Failure, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

export function taskFailed(task: string, step: number, error: unknown, meta: OutcomeMeta = {}): Fail {
  return fail(
    failure("task-failed", `Task ${task} failed at step ${step}: ${errorMessage(error)}`, {
      context: { task, step },
      error,
    }),
    meta
  );
}

export function cancelled(task: string, meta: OutcomeMeta = {}): Fail {
  return fail(failure("cancelled", `Task ${task} was cancelled`, { context: { task } }), meta);
}

export function budgetExceeded(task: string, maxSteps: number, meta: OutcomeMeta = {}): Fail {
  return fail(
    failure("budget-exceeded", `Budget exceeded: ${maxSteps} steps (task ${task} unfinished)`, {
      context: { task, maxSteps },
    }),
    meta
  );
}
