import type { ClockPort } from "../ports/clock";

/** Longest delay setTimeout accepts; larger values fire after 1ms */
export const MAX_TIMER_MS = 2 ** 31 - 1;

function timerOrAbort(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const finish = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", finish);
      resolve();
    };
    const timer = setTimeout(finish, ms);
    signal?.addEventListener("abort", finish, { once: true });
  });
}

/**
 * Wall-clock time backed by timers.
 * Timers may fire a little early, so sleepUntil re-arms until the target has
 * really passed.
 */
export function createSystemClock(): ClockPort {
  return {
    nowMs(): number {
      return Date.now();
    },
    async sleepUntil(targetMs: number, signal?: AbortSignal): Promise<void> {
      let remaining = targetMs - Date.now();
      while (remaining > 0 && !signal?.aborted) {
        await timerOrAbort(Math.min(remaining, MAX_TIMER_MS), signal);
        remaining = targetMs - Date.now();
      }
    },
  };
}

/**
 * Virtual clock that jumps straight to whatever instant is waited for.
 * The jump happens on the next turn of the event loop, so work submitted
 * in the meantime can abort the wait and run at the current instant.
 */
export interface VirtualClock extends ClockPort {
  /** Move time forward; never backwards */
  advanceTo(targetMs: number): void;
  advanceBy(deltaMs: number): void;
}

export function createVirtualClock(startMs = 0): VirtualClock {
  let now = startMs;

  const advanceTo = (targetMs: number): void => {
    if (targetMs > now) {
      now = targetMs;
    }
  };

  return {
    nowMs(): number {
      return now;
    },
    async sleepUntil(targetMs: number, signal?: AbortSignal): Promise<void> {
      await new Promise<void>((resolve) => setImmediate(resolve));
      if (!signal?.aborted) {
        advanceTo(targetMs);
      }
    },
    advanceTo,
    advanceBy(deltaMs: number): void {
      advanceTo(now + deltaMs);
    },
  };
}
