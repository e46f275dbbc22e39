// src/index.ts
// taskloop - Public API

// ═══════════════════════════════════════════════════════════════════════════════
// SCHEDULER, TASKS, GATHER
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type TaskId,
  type TaskStatus,
  type StepInstruction,
  type StepContext,
  type TaskBody,
  type TaskSpec,
  type TaskHandle,
  type TaskState,
  type SchedulerOptions,
  type SchedulerState,
  type SchedulerStatus,
  type SiblingPolicy,
  type GatherOptions,
  type GatherGroup,
  type PrinterOptions,
  suspend,
  complete,
  isFinished,
  createScheduler,
  spawnTask,
  cancelTask,
  observeTask,
  getTask,
  runScheduler,
  drainScheduler,
  getSchedulerStatus,
  taskStatuses,
  countdownBody,
  printerTask,
  createGatherGroup,
  gather,
  groupFinished,
  SchedulerInvariantError,
  TaskDefinitionError,
} from "./core/concurrency";

// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOMES
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./outcome";

// ═══════════════════════════════════════════════════════════════════════════════
// PORTS & ADAPTERS
// ═══════════════════════════════════════════════════════════════════════════════

export type { ClockPort, RecordSink, StepRecord, TraceEvent, TraceSink } from "./ports";
export { createSystemClock, createVirtualClock, type VirtualClock } from "./adapters/clock";
export { consoleRecordSink, memoryRecordSink, teeRecordSink, type MemoryRecordSink } from "./adapters/sinks";
export { formatTraceEvent, consoleTraceSink, loggingClock } from "./adapters/logging";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION & RUNTIME
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";
export { runTaskloop, clockFor, type RunIo, type RunResult } from "./runtime";
