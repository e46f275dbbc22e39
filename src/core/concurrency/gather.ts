// src/core/concurrency/gather.ts
// Join a group of tasks: wait for all, or stop at the first failure

import type { Failure, Outcome } from "../../outcome";
import { done, fail } from "../../outcome";
import { spawnTask, observeTask, cancelTask, runScheduler } from "./scheduler";
import type { SchedulerState, TaskHandle, TaskSpec, TaskState } from "./types";
import { isFinished } from "./types";

/**
 * What happens to the rest of the group after one member fails.
 * - abandon: cancel every unfinished sibling and report at once
 * - drain:   let siblings run to completion, then report the first failure
 */
export type SiblingPolicy = "abandon" | "drain";

export type GatherOptions = {
  siblings?: SiblingPolicy;
};

export type GatherGroup = {
  readonly members: readonly TaskHandle[];
  completed: number;
  failure?: Failure;
  outcome?: Outcome<void>;
  readonly settled: Promise<Outcome<void>>;
};

/**
 * Submit `specs` as one group, in list order, and start tracking it.
 */
export function createGatherGroup(
  scheduler: SchedulerState,
  specs: readonly TaskSpec[],
  siblings: SiblingPolicy = "abandon"
): GatherGroup {
  let resolveGroup: (outcome: Outcome<void>) => void = () => {};
  const settled = new Promise<Outcome<void>>((resolve) => {
    resolveGroup = resolve;
  });

  const members = specs.map((spec) => spawnTask(scheduler, spec));
  const group: GatherGroup = { members, completed: 0, failure: undefined, outcome: undefined, settled };

  const settle = (outcome: Outcome<void>): void => {
    group.outcome = outcome;
    resolveGroup(outcome);
  };

  if (members.length === 0) {
    settle(done(undefined));
    return group;
  }

  let finished = 0;
  const onFinished = (task: TaskState): void => {
    finished++;
    if (group.outcome) return;

    if (task.outcome?.tag === "Done") {
      group.completed++;
    } else if (task.outcome?.tag === "Fail" && !group.failure) {
      group.failure = task.outcome.failure;
      if (siblings === "abandon") {
        settle(fail(group.failure, task.outcome.meta));
        for (const member of members) {
          cancelTask(scheduler, member.id);
        }
        return;
      }
    }

    if (finished === members.length) {
      settle(group.failure ? fail(group.failure) : done(undefined, { atMs: scheduler.clock.nowMs() }));
    }
  };

  for (const member of members) {
    observeTask(scheduler, member.id, onFinished);
  }
  return group;
}

/**
 * Run `specs` concurrently and wait for the group.
 * Resolves Done once every member completed, or Fail with the first member
 * failure. Rejects only if the scheduler breaks an invariant.
 */
export async function gather(
  scheduler: SchedulerState,
  specs: readonly TaskSpec[],
  options: GatherOptions = {}
): Promise<Outcome<void>> {
  const group = createGatherGroup(scheduler, specs, options.siblings);

  while (group.outcome === undefined) {
    await Promise.race([group.settled, runScheduler(scheduler)]);
  }
  return group.outcome;
}

/**
 * True once no member of the group is still pending, running or suspended.
 */
export function groupFinished(group: GatherGroup): boolean {
  return group.members.every((m) => isFinished(m.status()));
}
