export type { ClockPort } from "./clock";
export type { RecordSink, StepRecord } from "./sink";
export type { TraceEvent, TraceSink } from "./types";
