import type { RecordSink, StepRecord } from "../ports/sink";

/**
 * Prints the task name of every record, one per line.
 */
export function consoleRecordSink(write: (line: string) => void = (line) => console.log(line)): RecordSink {
  return {
    emit(record: StepRecord): void {
      write(record.task);
    },
  };
}

export interface MemoryRecordSink extends RecordSink {
  readonly records: StepRecord[];
  /** Task names in emission order */
  names(): string[];
}

export function memoryRecordSink(): MemoryRecordSink {
  const records: StepRecord[] = [];
  return {
    records,
    emit(record: StepRecord): void {
      records.push(record);
    },
    names(): string[] {
      return records.map((r) => r.task);
    },
  };
}

/**
 * Forward every record to each of the given sinks.
 */
export function teeRecordSink(...sinks: RecordSink[]): RecordSink {
  return {
    emit(record: StepRecord): void {
      for (const sink of sinks) {
        sink.emit(record);
      }
    },
  };
}
