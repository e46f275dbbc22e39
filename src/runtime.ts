// src/runtime.ts
// Wires config, clock, sinks and the scheduler into one run

import type { ClockPort } from "./ports/clock";
import type { StepRecord } from "./ports/sink";
import type { Outcome } from "./outcome";
import type { TaskloopConfig } from "./core/config";
import { createScheduler, drainScheduler, gather, printerTask, type SchedulerState } from "./core/concurrency";
import { createSystemClock, createVirtualClock } from "./adapters/clock";
import { consoleRecordSink, memoryRecordSink, teeRecordSink } from "./adapters/sinks";
import { consoleTraceSink, loggingClock } from "./adapters/logging";

export type RunIo = {
  /** Receives one line per step record */
  out: (line: string) => void;
  /** Receives trace output */
  err: (line: string) => void;
  /** Overrides the clock chosen by config */
  clock?: ClockPort;
};

export type RunResult = {
  outcome: Outcome<void>;
  records: StepRecord[];
  scheduler: SchedulerState;
};

export function clockFor(config: TaskloopConfig): ClockPort {
  return config.clock === "virtual" ? createVirtualClock() : createSystemClock();
}

/**
 * Run every configured task as one gather group and wait until the
 * scheduler has nothing left to do.
 */
export async function runTaskloop(config: TaskloopConfig, io: RunIo): Promise<RunResult> {
  const baseClock = io.clock ?? clockFor(config);
  const clock = config.trace ? loggingClock(baseClock, io.err) : baseClock;

  const scheduler = createScheduler({
    name: "taskloop",
    clock,
    maxSteps: config.maxSteps,
    trace: config.trace ? consoleTraceSink(io.err) : undefined,
  });

  const memory = memoryRecordSink();
  const sink = teeRecordSink(consoleRecordSink(io.out), memory);
  const specs = config.tasks.map((t) =>
    printerTask({ name: t.name, steps: t.steps, intervalMs: config.intervalMs, sink })
  );

  const outcome = await gather(scheduler, specs, { siblings: config.siblings });
  await drainScheduler(scheduler);

  return { outcome, records: memory.records, scheduler };
}
