/**
 * One observable side effect produced by a task step.
 */
export interface StepRecord {
  /** Name of the task that produced the record */
  task: string;
  /** 1-based step number within that task */
  step: number;
  /** Clock reading when the step ran */
  atMs: number;
}

/**
 * Sink port interface.
 * Receives step records in the order the scheduler produced them.
 */
export interface RecordSink {
  emit(record: StepRecord): void;
}
