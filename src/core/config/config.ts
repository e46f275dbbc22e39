// src/core/config/config.ts
// Configuration system for taskloop

import * as fs from "fs";
import * as path from "path";
import type { SiblingPolicy } from "../concurrency/gather";

// =========================================================================
// Configuration Types
// =========================================================================

export type ClockKind = "system" | "virtual";

export type TaskConfig = {
  /** Name printed on every step */
  name: string;
  /** Number of steps to run */
  steps: number;
};

export type TaskloopConfig = {
  /** Pause between consecutive steps of a task, in milliseconds */
  intervalMs: number;
  /** Tasks to run, in submission order */
  tasks: TaskConfig[];
  /** What gather does with siblings after a failure */
  siblings: SiblingPolicy;
  /** Time source */
  clock: ClockKind;
  /** Print scheduler transitions to stderr */
  trace: boolean;
  /** Maximum total resumptions (unlimited when absent) */
  maxSteps?: number;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_TASKS: TaskConfig[] = [
  { name: "A", steps: 5 },
  { name: "B", steps: 2 },
];

export const DEFAULT_CONFIG: TaskloopConfig = {
  intervalMs: 1000,
  tasks: DEFAULT_TASKS,
  siblings: "abandon",
  clock: "system",
  trace: false,
};

// =========================================================================
// Parsing helpers
// =========================================================================

const SIBLING_POLICIES: readonly SiblingPolicy[] = ["abandon", "drain"];
const CLOCK_KINDS: readonly ClockKind[] = ["system", "virtual"];

function isSiblingPolicy(value: unknown): value is SiblingPolicy {
  return SIBLING_POLICIES.some((p) => p === value);
}

function isClockKind(value: unknown): value is ClockKind {
  return CLOCK_KINDS.some((k) => k === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseBool(raw: string): boolean | undefined {
  const v = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(v)) return true;
  if (["0", "false", "no", "off", ""].includes(v)) return false;
  return undefined;
}

function parseNumber(raw: string, what: string): number {
  const n = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(n)) {
    throw new ConfigError(`${what} must be a number, got "${raw}"`);
  }
  return n;
}

/**
 * Parse a `name:steps` task definition, e.g. `A:5`.
 */
export function parseTaskSpec(raw: string): TaskConfig {
  const idx = raw.lastIndexOf(":");
  if (idx <= 0 || idx === raw.length - 1) {
    throw new ConfigError(`Task must look like name:steps, got "${raw}"`);
  }
  const name = raw.slice(0, idx);
  const steps = parseNumber(raw.slice(idx + 1), `Steps of task ${name}`);
  return { name, steps };
}

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Load configuration overrides from environment variables.
 * Only variables that are set appear in the result.
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  prefix = "TASKLOOP"
): Partial<TaskloopConfig> {
  const result: Partial<TaskloopConfig> = {};

  const interval = env[`${prefix}_INTERVAL_MS`];
  if (interval !== undefined) {
    result.intervalMs = parseNumber(interval, `${prefix}_INTERVAL_MS`);
  }

  const siblings = env[`${prefix}_SIBLINGS`];
  if (siblings !== undefined) {
    if (!isSiblingPolicy(siblings)) {
      throw new ConfigError(`${prefix}_SIBLINGS must be one of ${SIBLING_POLICIES.join(", ")}, got "${siblings}"`);
    }
    result.siblings = siblings;
  }

  const clock = env[`${prefix}_CLOCK`];
  if (clock !== undefined) {
    if (!isClockKind(clock)) {
      throw new ConfigError(`${prefix}_CLOCK must be one of ${CLOCK_KINDS.join(", ")}, got "${clock}"`);
    }
    result.clock = clock;
  }

  const trace = env[`${prefix}_TRACE`];
  if (trace !== undefined) {
    const parsed = parseBool(trace);
    if (parsed === undefined) {
      throw new ConfigError(`${prefix}_TRACE must be a boolean, got "${trace}"`);
    }
    result.trace = parsed;
  }

  const maxSteps = env[`${prefix}_MAX_STEPS`];
  if (maxSteps !== undefined) {
    result.maxSteps = parseNumber(maxSteps, `${prefix}_MAX_STEPS`);
  }

  const tasks = env[`${prefix}_TASKS`];
  if (tasks !== undefined) {
    result.tasks = tasks.split(",").map((t) => parseTaskSpec(t.trim()));
  }

  return result;
}

/**
 * Create configuration overrides from a plain object (e.g., parsed JSON).
 * Accepts camelCase and snake_case keys.
 */
export function configFromObject(data: Record<string, unknown>): Partial<TaskloopConfig> {
  const result: Partial<TaskloopConfig> = {};

  const interval = data.intervalMs ?? data.interval_ms;
  if (interval !== undefined) {
    if (typeof interval !== "number") throw new ConfigError("intervalMs must be a number");
    result.intervalMs = interval;
  }

  if (data.siblings !== undefined) {
    if (!isSiblingPolicy(data.siblings)) {
      throw new ConfigError(`siblings must be one of ${SIBLING_POLICIES.join(", ")}`);
    }
    result.siblings = data.siblings;
  }

  if (data.clock !== undefined) {
    if (!isClockKind(data.clock)) {
      throw new ConfigError(`clock must be one of ${CLOCK_KINDS.join(", ")}`);
    }
    result.clock = data.clock;
  }

  if (data.trace !== undefined) {
    if (typeof data.trace !== "boolean") throw new ConfigError("trace must be a boolean");
    result.trace = data.trace;
  }

  const maxSteps = data.maxSteps ?? data.max_steps;
  if (maxSteps !== undefined) {
    if (typeof maxSteps !== "number") throw new ConfigError("maxSteps must be a number");
    result.maxSteps = maxSteps;
  }

  if (data.tasks !== undefined) {
    if (!Array.isArray(data.tasks)) throw new ConfigError("tasks must be an array");
    const entries: unknown[] = data.tasks;
    result.tasks = entries.map((t, i): TaskConfig => {
      if (typeof t === "string") return parseTaskSpec(t);
      if (isRecord(t) && typeof t.name === "string" && typeof t.steps === "number") {
        return { name: t.name, steps: t.steps };
      }
      throw new ConfigError(`tasks[${i}] must be "name:steps" or { name, steps }`);
    });
  }

  return result;
}

/**
 * Load configuration overrides from a JSON file.
 */
export function configFromFile(filePath: string): Partial<TaskloopConfig> {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Config file not found: ${filePath}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new ConfigError(`Unsupported config file format: ${ext}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!isRecord(data)) {
    throw new ConfigError(`Config file ${filePath} must contain a JSON object`);
  }
  return configFromObject(data);
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: Partial<TaskloopConfig>[]): TaskloopConfig {
  let result: TaskloopConfig = { ...DEFAULT_CONFIG, tasks: [...DEFAULT_CONFIG.tasks] };

  for (const cfg of configs) {
    result = {
      intervalMs: cfg.intervalMs ?? result.intervalMs,
      tasks: cfg.tasks ?? result.tasks,
      siblings: cfg.siblings ?? result.siblings,
      clock: cfg.clock ?? result.clock,
      trace: cfg.trace ?? result.trace,
      maxSteps: cfg.maxSteps ?? result.maxSteps,
    };
  }

  return result;
}

// =========================================================================
// Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
};

export function validateConfig(config: TaskloopConfig): ConfigValidation {
  const errors: string[] = [];

  if (!Number.isFinite(config.intervalMs) || config.intervalMs < 0) {
    errors.push(`intervalMs must be a non-negative number, got ${config.intervalMs}`);
  }

  const seen = new Set<string>();
  config.tasks.forEach((task, i) => {
    if (task.name.length === 0) {
      errors.push(`tasks[${i}] has an empty name`);
    }
    if (!Number.isInteger(task.steps) || task.steps < 0) {
      errors.push(`tasks[${i}] (${task.name}) steps must be a non-negative integer, got ${task.steps}`);
    }
    if (seen.has(task.name)) {
      errors.push(`tasks[${i}] duplicates the name ${task.name}`);
    }
    seen.add(task.name);
  });

  if (config.maxSteps !== undefined && (!Number.isInteger(config.maxSteps) || config.maxSteps <= 0)) {
    errors.push(`maxSteps must be a positive integer, got ${config.maxSteps}`);
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<TaskloopConfig>;
}): TaskloopConfig {
  const layers: Partial<TaskloopConfig>[] = [configFromEnv(options?.env)];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else if (fs.existsSync("taskloop.config.json")) {
    layers.push(configFromFile("taskloop.config.json"));
  }

  if (options?.overrides) {
    layers.push(options.overrides);
  }

  const config = mergeConfigs(...layers);
  const validation = validateConfig(config);
  if (!validation.valid) {
    throw new ConfigError(`Invalid configuration:\n  - ${validation.errors.join("\n  - ")}`);
  }
  return config;
}
