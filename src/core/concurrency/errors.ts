// src/core/concurrency/errors.ts

/**
 * Raised when the scheduler detects a state it can never legitimately reach,
 * such as resuming a task before its wake time. Always fatal.
 */
export class SchedulerInvariantError extends Error {
  constructor(message: string) {
    super(`Scheduler invariant violated: ${message}`);
    this.name = "SchedulerInvariantError";
  }
}

/**
 * Raised when a task is defined with an unusable step count or interval.
 */
export class TaskDefinitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TaskDefinitionError";
  }
}
