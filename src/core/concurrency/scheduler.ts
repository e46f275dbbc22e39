// src/core/concurrency/scheduler.ts
// Cooperative single-threaded scheduler with timed suspension

import type { TraceEvent } from "../../ports/types";
import type { Outcome } from "../../outcome";
import { done, fail, failure, taskFailed, cancelled, budgetExceeded } from "../../outcome";
import { createSystemClock } from "../../adapters/clock";
import { SchedulerInvariantError } from "./errors";
import {
  type TaskId,
  type TaskSpec,
  type TaskState,
  type TaskStatus,
  type TaskHandle,
  type TaskObserver,
  type StepInstruction,
  type SchedulerOptions,
  type SchedulerState,
  type SchedulerStatus,
  isFinished,
} from "./types";

// ─────────────────────────────────────────────────────────────────
// Scheduler creation
// ─────────────────────────────────────────────────────────────────

/**
 * Create a new, independent scheduler.
 */
export function createScheduler(options: SchedulerOptions = {}): SchedulerState {
  return {
    name: options.name ?? "scheduler",
    clock: options.clock ?? createSystemClock(),
    tasks: new Map(),
    readyQueue: [],
    sleeping: [],
    running: undefined,
    nextId: 0,
    stepCount: 0,
    maxSteps: options.maxSteps,
    ledger: [],
    trace: options.trace,
    driving: false,
    driver: undefined,
    wakeDriver: undefined,
  };
}

function record(scheduler: SchedulerState, event: TraceEvent): void {
  scheduler.ledger.push(event);
  scheduler.trace?.emit(event);
}

// ─────────────────────────────────────────────────────────────────
// Task management
// ─────────────────────────────────────────────────────────────────

/**
 * Submit a task. It joins the tail of the ready queue as `pending`.
 */
export function spawnTask(scheduler: SchedulerState, spec: TaskSpec): TaskHandle {
  const id = scheduler.nextId++;
  const now = scheduler.clock.nowMs();

  let settle: (outcome: Outcome<void>) => void = () => {};
  const settled = new Promise<Outcome<void>>((resolve) => {
    settle = resolve;
  });

  const task: TaskState = {
    id,
    name: spec.name,
    body: spec.body,
    status: "pending",
    stepsRun: 0,
    wakeAtMs: now,
    cancelRequested: false,
    outcome: undefined,
    observers: [],
    settle,
    settled,
  };

  scheduler.tasks.set(id, task);
  scheduler.readyQueue.push(id);
  record(scheduler, { tag: "spawn", taskId: id, name: task.name, atMs: now });
  scheduler.wakeDriver?.();

  return {
    id,
    name: task.name,
    status: () => task.status,
    cancel: () => cancelTask(scheduler, id),
    settled,
  };
}

export function getTask(scheduler: SchedulerState, id: TaskId): TaskState | undefined {
  return scheduler.tasks.get(id);
}

function getTaskOrThrow(scheduler: SchedulerState, id: TaskId): TaskState {
  const task = scheduler.tasks.get(id);
  if (!task) {
    throw new SchedulerInvariantError(`unknown task id ${id}`);
  }
  return task;
}

/**
 * Register a callback run synchronously when the task finishes.
 * Fires immediately if it already has.
 */
export function observeTask(scheduler: SchedulerState, id: TaskId, observer: TaskObserver): void {
  const task = getTaskOrThrow(scheduler, id);
  if (isFinished(task.status)) {
    observer(task);
    return;
  }
  task.observers.push(observer);
}

function removeFromRunSet(scheduler: SchedulerState, id: TaskId): void {
  const readyIdx = scheduler.readyQueue.indexOf(id);
  if (readyIdx >= 0) {
    scheduler.readyQueue.splice(readyIdx, 1);
  }
  const sleepIdx = scheduler.sleeping.indexOf(id);
  if (sleepIdx >= 0) {
    scheduler.sleeping.splice(sleepIdx, 1);
  }
}

function finishTask(
  scheduler: SchedulerState,
  task: TaskState,
  status: Extract<TaskStatus, "completed" | "failed" | "cancelled">,
  outcome: Outcome<void>
): void {
  const from = task.status;
  if (isFinished(from)) {
    throw new SchedulerInvariantError(`task ${task.name} finished twice (already ${from})`);
  }
  task.status = status;
  task.outcome = outcome;
  if (scheduler.running === task.id) {
    scheduler.running = undefined;
  }

  const atMs = scheduler.clock.nowMs();
  if (status === "completed") {
    record(scheduler, { tag: "complete", taskId: task.id, name: task.name, steps: task.stepsRun, atMs });
  } else if (status === "cancelled") {
    record(scheduler, { tag: "cancel", taskId: task.id, name: task.name, from, atMs });
  } else {
    const message = outcome.tag === "Fail" ? outcome.failure.message : "unknown failure";
    record(scheduler, { tag: "fail", taskId: task.id, name: task.name, message, atMs });
  }

  const observers = task.observers;
  task.observers = [];
  for (const observer of observers) {
    observer(task);
  }
  task.settle(outcome);
}

/**
 * Cancel a task.
 * Pending and suspended tasks leave the run-set at once; a running task is
 * cancelled at its next suspension point. Finished tasks are left alone.
 */
export function cancelTask(scheduler: SchedulerState, id: TaskId): boolean {
  const task = scheduler.tasks.get(id);
  if (!task) return false;

  switch (task.status) {
    case "pending":
    case "suspended":
      removeFromRunSet(scheduler, id);
      finishTask(scheduler, task, "cancelled", cancelled(task.name, { atMs: scheduler.clock.nowMs() }));
      return true;
    case "running":
      task.cancelRequested = true;
      return true;
    default:
      return false;
  }
}

// ─────────────────────────────────────────────────────────────────
// Run-set maintenance
// ─────────────────────────────────────────────────────────────────

function insertSleeping(scheduler: SchedulerState, task: TaskState): void {
  const sleeping = scheduler.sleeping;
  let idx = sleeping.length;
  while (idx > 0) {
    const prev = getTaskOrThrow(scheduler, sleeping[idx - 1] ?? -1);
    if (prev.wakeAtMs < task.wakeAtMs || (prev.wakeAtMs === task.wakeAtMs && prev.id < task.id)) {
      break;
    }
    idx--;
  }
  sleeping.splice(idx, 0, task.id);
}

/**
 * Move every sleeping task whose wake time has passed onto the ready queue,
 * earliest wake time first, submission order among equals.
 */
function promoteDueTasks(scheduler: SchedulerState): void {
  const now = scheduler.clock.nowMs();
  while (scheduler.sleeping.length > 0) {
    const head = getTaskOrThrow(scheduler, scheduler.sleeping[0] ?? -1);
    if (head.wakeAtMs > now) break;
    scheduler.sleeping.shift();
    scheduler.readyQueue.push(head.id);
  }
}

function exhaustBudget(scheduler: SchedulerState, maxSteps: number): void {
  const remaining = [...scheduler.readyQueue, ...scheduler.sleeping];
  scheduler.readyQueue = [];
  scheduler.sleeping = [];
  for (const id of remaining) {
    const task = getTaskOrThrow(scheduler, id);
    // an earlier failure may have cancelled it through a gather observer
    if (isFinished(task.status)) continue;
    finishTask(scheduler, task, "failed", budgetExceeded(task.name, maxSteps, { atMs: scheduler.clock.nowMs() }));
  }
}

// ─────────────────────────────────────────────────────────────────
// Scheduler execution
// ─────────────────────────────────────────────────────────────────

/**
 * Resume one task for exactly one step.
 */
function resumeTask(scheduler: SchedulerState, id: TaskId): void {
  const task = getTaskOrThrow(scheduler, id);
  if (task.status !== "pending" && task.status !== "suspended") {
    throw new SchedulerInvariantError(`task ${task.name} resumed while ${task.status}`);
  }
  const now = scheduler.clock.nowMs();
  if (now < task.wakeAtMs) {
    throw new SchedulerInvariantError(`task ${task.name} resumed at ${now} before its wake time ${task.wakeAtMs}`);
  }

  task.status = "running";
  task.stepsRun++;
  scheduler.running = id;
  scheduler.stepCount++;
  record(scheduler, { tag: "resume", taskId: id, name: task.name, step: task.stepsRun, atMs: now });

  let instruction: StepInstruction;
  try {
    instruction = task.body.resume({ task: task.name, step: task.stepsRun, nowMs: now });
  } catch (error) {
    finishTask(scheduler, task, "failed", taskFailed(task.name, task.stepsRun, error, { atMs: now }));
    return;
  }

  const suspendedAt = scheduler.clock.nowMs();
  if (instruction.tag === "Complete") {
    finishTask(scheduler, task, "completed", done(undefined, { atMs: suspendedAt }));
    return;
  }

  const { durationMs } = instruction;
  if (!Number.isFinite(durationMs) || durationMs < 0) {
    const f = failure("invalid-suspension", `Task ${task.name} asked to suspend for ${durationMs}ms`, {
      context: { task: task.name, step: task.stepsRun },
    });
    finishTask(scheduler, task, "failed", fail(f, { atMs: suspendedAt }));
    return;
  }

  if (task.cancelRequested) {
    finishTask(scheduler, task, "cancelled", cancelled(task.name, { atMs: suspendedAt }));
    return;
  }

  task.status = "suspended";
  task.wakeAtMs = suspendedAt + durationMs;
  scheduler.running = undefined;
  insertSleeping(scheduler, task);
  record(scheduler, { tag: "suspend", taskId: id, name: task.name, wakeAtMs: task.wakeAtMs, atMs: suspendedAt });
}

/**
 * Sleep until `untilMs`, waking early if a new task is submitted meanwhile.
 */
async function sleepInterruptibly(scheduler: SchedulerState, untilMs: number): Promise<void> {
  const controller = new AbortController();
  scheduler.wakeDriver = () => controller.abort();
  try {
    await scheduler.clock.sleepUntil(untilMs, controller.signal);
  } finally {
    scheduler.wakeDriver = undefined;
  }
}

async function driveLoop(scheduler: SchedulerState): Promise<void> {
  if (scheduler.driving) {
    throw new SchedulerInvariantError(`${scheduler.name} is already being driven`);
  }
  scheduler.driving = true;

  try {
    for (;;) {
      promoteDueTasks(scheduler);

      const nextId = scheduler.readyQueue.shift();
      if (nextId === undefined) {
        const earliest = scheduler.sleeping[0];
        if (earliest === undefined) {
          return;
        }
        const untilMs = getTaskOrThrow(scheduler, earliest).wakeAtMs;
        record(scheduler, { tag: "sleep", untilMs, atMs: scheduler.clock.nowMs() });
        await sleepInterruptibly(scheduler, untilMs);
        continue;
      }

      if (scheduler.maxSteps !== undefined && scheduler.stepCount >= scheduler.maxSteps) {
        scheduler.readyQueue.unshift(nextId);
        exhaustBudget(scheduler, scheduler.maxSteps);
        continue;
      }

      resumeTask(scheduler, nextId);
    }
  } finally {
    scheduler.driving = false;
  }
}

/**
 * Drive the scheduler until its run-set is empty.
 * Joins the active driver if one is already looping, so there is never more
 * than one. Rejects only on invariant violations; task failures settle their
 * tasks.
 */
export function runScheduler(scheduler: SchedulerState): Promise<void> {
  if (scheduler.driving && scheduler.driver) {
    return scheduler.driver;
  }
  scheduler.driver = driveLoop(scheduler);
  return scheduler.driver;
}

/**
 * Wait until the run-set is empty.
 */
export async function drainScheduler(scheduler: SchedulerState): Promise<void> {
  while (scheduler.driving || scheduler.readyQueue.length > 0 || scheduler.sleeping.length > 0) {
    await runScheduler(scheduler);
  }
}

/**
 * Get the current status of the scheduler.
 */
export function getSchedulerStatus(scheduler: SchedulerState): SchedulerStatus {
  if (scheduler.running !== undefined) {
    return { tag: "running", taskId: scheduler.running };
  }
  if (scheduler.readyQueue.length > 0) {
    return { tag: "ready", count: scheduler.readyQueue.length };
  }
  const earliest = scheduler.sleeping[0];
  if (earliest !== undefined) {
    return { tag: "sleeping", untilMs: getTaskOrThrow(scheduler, earliest).wakeAtMs };
  }
  return { tag: "done" };
}

/**
 * Snapshot of every task's status, in submission order.
 */
export function taskStatuses(scheduler: SchedulerState): Array<{ id: TaskId; name: string; status: TaskStatus }> {
  return Array.from(scheduler.tasks.values()).map((t) => ({ id: t.id, name: t.name, status: t.status }));
}
