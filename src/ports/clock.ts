/**
 * Clock port interface.
 * MUST be used for all time access by the scheduler so runs can be made
 * deterministic by swapping in a virtual clock.
 */
export interface ClockPort {
  /**
   * Get current time in milliseconds.
   */
  nowMs(): number;

  /**
   * Resolve once `nowMs()` has reached at least `targetMs`, or as soon as
   * `signal` aborts. Resolving early without an abort is a contract
   * violation.
   */
  sleepUntil(targetMs: number, signal?: AbortSignal): Promise<void>;
}
