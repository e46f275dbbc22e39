// bin/taskloop-cli-lib.ts
// CLI utilities for the taskloop command
// Exported functions for testing

import * as fs from "fs";
import type { TaskloopConfig, TaskConfig } from "../src/core/config";
import { parseTaskSpec } from "../src/core/config";
import { match, type Outcome } from "../src/outcome";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  config?: string;
  interval?: string;
  tasks: string[];
  virtual?: boolean;
  siblings?: string;
  trace?: boolean;
  maxSteps?: string;
  /** Unknown flags and flags missing their value */
  problems: string[];
};

export const EXIT_OK = 0;
export const EXIT_TASK_FAILED = 1;
export const EXIT_USAGE = 2;

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = { tasks: [], problems: [] };

  let i = 0;
  const takeValue = (flag: string): string | undefined => {
    const next = args[i + 1];
    if (next === undefined || next.startsWith("--")) {
      result.problems.push(`${flag} needs a value`);
      return undefined;
    }
    i++;
    return next;
  };

  for (; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--virtual") {
      result.virtual = true;
    } else if (arg === "--trace") {
      result.trace = true;
    } else if (arg === "--config" || arg === "-c") {
      result.config = takeValue(arg);
    } else if (arg === "--interval") {
      result.interval = takeValue(arg);
    } else if (arg === "--siblings") {
      result.siblings = takeValue(arg);
    } else if (arg === "--max-steps") {
      result.maxSteps = takeValue(arg);
    } else if (arg === "--task" || arg === "-t") {
      const spec = takeValue(arg);
      if (spec !== undefined) result.tasks.push(spec);
    } else {
      result.problems.push(`unknown argument: ${arg}`);
    }
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
taskloop - run named counters side by side on a cooperative scheduler

USAGE:
  taskloop [options]

OPTIONS:
  -h, --help                         Show this help message
  -v, --version                      Show version information
  -t, --task <name:steps>            Add a task (repeatable; default A:5 B:2)
  --interval <ms>                    Pause between steps of a task (default 1000)
  --siblings abandon|drain           After a failure: cancel the rest, or let them finish
  --virtual                          Use a virtual clock (no real waiting)
  --max-steps <n>                    Fail remaining tasks after n resumptions
  --trace                            Print scheduler events to stderr
  -c, --config <file.json>           Read configuration from a JSON file

ENVIRONMENT:
  TASKLOOP_INTERVAL_MS, TASKLOOP_TASKS, TASKLOOP_SIBLINGS,
  TASKLOOP_CLOCK, TASKLOOP_TRACE, TASKLOOP_MAX_STEPS
  (also read from .env in the working directory)

EXIT CODES:
  0  every task completed
  1  a task failed
  2  bad arguments or configuration

EXAMPLES:
  taskloop                           # A five times, B twice, one second apart
  taskloop --virtual --trace         # Same order, instantly, with scheduler events
  taskloop -t tick:3 -t tock:3 --interval 250
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

export function getVersion(): string {
  try {
    const pkgPath = new URL("../package.json", import.meta.url);
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return `taskloop v${pkg.version}`;
    }
  } catch {
    // fall through to the built-in version
  }
  return "taskloop v0.1.0";
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Turn parsed flags into config overrides. Throws ConfigError on values
 * that do not parse; range checks are left to validateConfig.
 */
export function buildOverrides(args: CliArgs): Partial<TaskloopConfig> {
  const overrides: Partial<TaskloopConfig> = {};

  if (args.interval !== undefined) {
    overrides.intervalMs = Number(args.interval);
  }
  if (args.tasks.length > 0) {
    overrides.tasks = args.tasks.map((t): TaskConfig => parseTaskSpec(t));
  }
  if (args.siblings === "abandon" || args.siblings === "drain") {
    overrides.siblings = args.siblings;
  } else if (args.siblings !== undefined) {
    args.problems.push(`--siblings must be abandon or drain, got ${args.siblings}`);
  }
  if (args.virtual) {
    overrides.clock = "virtual";
  }
  if (args.trace) {
    overrides.trace = true;
  }
  if (args.maxSteps !== undefined) {
    overrides.maxSteps = Number(args.maxSteps);
  }

  return overrides;
}

export function exitCodeFor(outcome: Outcome<void>): number {
  return match(outcome, { done: () => EXIT_OK, fail: () => EXIT_TASK_FAILED });
}
