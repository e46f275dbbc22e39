import type { TaskId, TaskStatus } from "../core/concurrency/types";

/**
 * Trace event types for scheduler transitions.
 */
export type TraceEvent =
  | { tag: "spawn"; taskId: TaskId; name: string; atMs: number }
  | { tag: "resume"; taskId: TaskId; name: string; step: number; atMs: number }
  | { tag: "suspend"; taskId: TaskId; name: string; wakeAtMs: number; atMs: number }
  | { tag: "complete"; taskId: TaskId; name: string; steps: number; atMs: number }
  | { tag: "fail"; taskId: TaskId; name: string; message: string; atMs: number }
  | { tag: "cancel"; taskId: TaskId; name: string; from: TaskStatus; atMs: number }
  | { tag: "sleep"; untilMs: number; atMs: number };

/**
 * Trace sink for logging events.
 */
export interface TraceSink {
  emit(event: TraceEvent): void;
}
