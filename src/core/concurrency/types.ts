// src/core/concurrency/types.ts
// Cooperative task runner types

import type { ClockPort } from "../../ports/clock";
import type { TraceEvent, TraceSink } from "../../ports/types";
import type { Outcome } from "../../outcome";

// ─────────────────────────────────────────────────────────────────
// Task state
// ─────────────────────────────────────────────────────────────────

/**
 * TaskId: submission sequence number within one scheduler.
 * Lower ids were submitted first and win ready-queue ties.
 */
export type TaskId = number;

/**
 * TaskStatus: lifecycle of a task.
 *
 *   pending → running → suspended → running → … → completed | failed
 *
 * `cancelled` is reachable from pending or suspended, or from running at
 * the task's next suspension point.
 */
export type TaskStatus = "pending" | "running" | "suspended" | "completed" | "failed" | "cancelled";

/**
 * StepInstruction: what a task asks of the scheduler when a step ends.
 */
export type StepInstruction =
  | { tag: "Suspend"; durationMs: number }
  | { tag: "Complete" };

/**
 * StepContext: what a task sees when it is resumed.
 */
export type StepContext = {
  /** Task name */
  task: string;
  /** 1-based number of the step about to run */
  step: number;
  /** Clock reading at resumption */
  nowMs: number;
};

/**
 * TaskBody: explicit state machine for one task.
 * `resume` runs exactly one step synchronously; nothing can interleave
 * with it. Throwing fails the task.
 */
export interface TaskBody {
  resume(ctx: StepContext): StepInstruction;
}

/**
 * TaskSpec: what callers submit.
 */
export type TaskSpec = {
  name: string;
  body: TaskBody;
};

export type TaskObserver = (task: TaskState) => void;

/**
 * TaskState: internal state of a single task.
 */
export type TaskState = {
  id: TaskId;
  name: string;
  body: TaskBody;
  status: TaskStatus;
  /** Number of times the task has been resumed */
  stepsRun: number;
  /** Earliest instant the task may be resumed */
  wakeAtMs: number;
  /** Set when cancel() hits a running task */
  cancelRequested: boolean;
  /** Final outcome (once completed, failed or cancelled) */
  outcome?: Outcome<void>;
  /** Notified synchronously when the task finishes */
  observers: TaskObserver[];
  settle: (outcome: Outcome<void>) => void;
  settled: Promise<Outcome<void>>;
};

/**
 * TaskHandle: caller-facing view of a spawned task.
 */
export type TaskHandle = {
  readonly id: TaskId;
  readonly name: string;
  status(): TaskStatus;
  /**
   * Returns false when the task had already finished. For a running task,
   * true only means the request was recorded: if that step completes the
   * task, it still finishes `completed`.
   */
  cancel(): boolean;
  /** Resolves once the task finishes; never rejects */
  readonly settled: Promise<Outcome<void>>;
};

// ─────────────────────────────────────────────────────────────────
// Scheduler state
// ─────────────────────────────────────────────────────────────────

export type SchedulerOptions = {
  /** Time source; defaults to the system clock */
  clock?: ClockPort;
  /** Receives every transition as it happens */
  trace?: TraceSink;
  /** Maximum total resumptions before remaining tasks fail */
  maxSteps?: number;
  /** Label used in trace output */
  name?: string;
};

/**
 * SchedulerState: one independent event loop.
 * The run-set is `readyQueue` + `sleeping` + `running`; a task is in at
 * most one of them.
 */
export type SchedulerState = {
  name: string;
  clock: ClockPort;
  /** Every task ever submitted, by id */
  tasks: Map<TaskId, TaskState>;
  /** Runnable tasks, FIFO */
  readyQueue: TaskId[];
  /** Suspended tasks ordered by (wakeAtMs, id) */
  sleeping: TaskId[];
  /** Task currently executing a step */
  running?: TaskId;
  nextId: TaskId;
  /** Global resumption count */
  stepCount: number;
  maxSteps?: number;
  /** Every trace event, in order */
  ledger: TraceEvent[];
  trace?: TraceSink;
  /** True while runScheduler is looping */
  driving: boolean;
  driver?: Promise<void>;
  /** Interrupts the driver's current sleep, if any */
  wakeDriver?: () => void;
};

/**
 * SchedulerStatus: current state of the scheduler.
 */
export type SchedulerStatus =
  | { tag: "running"; taskId: TaskId }
  | { tag: "ready"; count: number }
  | { tag: "sleeping"; untilMs: number }
  | { tag: "done" };

// ─────────────────────────────────────────────────────────────────
// Instruction helpers
// ─────────────────────────────────────────────────────────────────

export function suspend(durationMs: number): StepInstruction {
  return { tag: "Suspend", durationMs };
}

export function complete(): StepInstruction {
  return { tag: "Complete" };
}

export function isFinished(status: TaskStatus): boolean {
  return status === "completed" || status === "failed" || status === "cancelled";
}
