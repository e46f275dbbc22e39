// src/core/concurrency/task.ts
// Task bodies: fixed-length step sequences with a pause between steps

import type { RecordSink } from "../../ports/sink";
import { TaskDefinitionError } from "./errors";
import { type StepContext, type TaskBody, type TaskSpec, suspend, complete } from "./types";

function checkSteps(steps: number): void {
  if (!Number.isInteger(steps) || steps < 0) {
    throw new TaskDefinitionError(`steps must be a non-negative integer, got ${steps}`);
  }
}

function checkInterval(intervalMs: number): void {
  if (!Number.isFinite(intervalMs) || intervalMs < 0) {
    throw new TaskDefinitionError(`intervalMs must be a non-negative number, got ${intervalMs}`);
  }
}

/**
 * Body that runs `action` for steps 1..steps, suspending `intervalMs`
 * between consecutive steps but not after the last one.
 * With zero steps the first resumption completes without calling `action`.
 */
export function countdownBody(
  steps: number,
  intervalMs: number,
  action: (ctx: StepContext) => void
): TaskBody {
  checkSteps(steps);
  checkInterval(intervalMs);

  return {
    resume(ctx: StepContext) {
      if (ctx.step > steps) {
        return complete();
      }
      action(ctx);
      return ctx.step < steps ? suspend(intervalMs) : complete();
    },
  };
}

export type PrinterOptions = {
  name: string;
  steps: number;
  intervalMs: number;
  sink: RecordSink;
  /** Throw at this step instead of emitting its record */
  failAt?: number;
};

/**
 * The demo counter: emits its own name once per step.
 */
export function printerTask(options: PrinterOptions): TaskSpec {
  const { name, steps, intervalMs, sink, failAt } = options;
  if (name.length === 0) {
    throw new TaskDefinitionError("task name must not be empty");
  }

  return {
    name,
    body: countdownBody(steps, intervalMs, (ctx) => {
      if (failAt === ctx.step) {
        throw new Error(`${name} failed at step ${ctx.step}`);
      }
      sink.emit({ task: name, step: ctx.step, atMs: ctx.nowMs });
    }),
  };
}
