import type { ClockPort } from "../ports/clock";
import type { TraceEvent, TraceSink } from "../ports/types";

/**
 * Render one trace event as a single log line.
 */
export function formatTraceEvent(event: TraceEvent): string {
  const at = `[${event.atMs}ms]`;
  switch (event.tag) {
    case "spawn":
      return `${at} spawn    #${event.taskId} ${event.name}`;
    case "resume":
      return `${at} resume   #${event.taskId} ${event.name} step ${event.step}`;
    case "suspend":
      return `${at} suspend  #${event.taskId} ${event.name} until ${event.wakeAtMs}ms`;
    case "complete":
      return `${at} complete #${event.taskId} ${event.name} after ${event.steps} steps`;
    case "fail":
      return `${at} fail     #${event.taskId} ${event.name}: ${event.message}`;
    case "cancel":
      return `${at} cancel   #${event.taskId} ${event.name} (was ${event.from})`;
    case "sleep":
      return `${at} sleep    until ${event.untilMs}ms`;
  }
}

/**
 * Trace sink writing formatted events to stderr.
 */
export function consoleTraceSink(write: (line: string) => void = (line) => console.error(line)): TraceSink {
  return {
    emit(event: TraceEvent): void {
      write(formatTraceEvent(event));
    },
  };
}

/**
 * Wrap clock port with logging of the waits it performs.
 */
export function loggingClock(inner: ClockPort, log: (line: string) => void): ClockPort {
  return {
    nowMs(): number {
      return inner.nowMs();
    },
    async sleepUntil(targetMs: number, signal?: AbortSignal): Promise<void> {
      const start = inner.nowMs();
      await inner.sleepUntil(targetMs, signal);
      const end = inner.nowMs();
      const asked = Math.max(0, targetMs - start);
      log(`clock: waited ${end - start}ms (asked for ${asked}ms${signal?.aborted ? ", woken early" : ""})`);
    },
  };
}
