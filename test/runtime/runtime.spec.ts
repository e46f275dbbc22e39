// test/runtime/runtime.spec.ts
// End-to-end run of the configured tasks

import { describe, it, expect } from "vitest";
import { runTaskloop, clockFor } from "../../src/runtime";
import { DEFAULT_CONFIG, type TaskloopConfig } from "../../src/core/config";
import { createVirtualClock } from "../../src/adapters/clock";

function virtualConfig(overrides: Partial<TaskloopConfig> = {}): TaskloopConfig {
  return { ...DEFAULT_CONFIG, clock: "virtual", ...overrides };
}

describe("runTaskloop", () => {
  it("prints A and B in the canonical order", async () => {
    const out: string[] = [];
    const err: string[] = [];

    const { outcome, records, scheduler } = await runTaskloop(virtualConfig(), {
      out: (line) => out.push(line),
      err: (line) => err.push(line),
    });

    expect(outcome.tag).toBe("Done");
    expect(out).toEqual(["A", "B", "A", "B", "A", "A", "A"]);
    expect(records).toHaveLength(7);
    expect(err).toEqual([]);
    expect(scheduler.clock.nowMs()).toBe(4000);
  });

  it("writes scheduler events and clock waits to err when tracing", async () => {
    const err: string[] = [];

    await runTaskloop(virtualConfig({ trace: true, tasks: [{ name: "T", steps: 2 }], intervalMs: 10 }), {
      out: () => {},
      err: (line) => err.push(line),
    });

    expect(err).toEqual([
      "[0ms] spawn    #0 T",
      "[0ms] resume   #0 T step 1",
      "[0ms] suspend  #0 T until 10ms",
      "[0ms] sleep    until 10ms",
      "clock: waited 10ms (asked for 10ms)",
      "[10ms] resume   #0 T step 2",
      "[10ms] complete #0 T after 2 steps",
    ]);
  });

  it("uses the clock handed in by the caller", async () => {
    const clock = createVirtualClock(500);

    const { records } = await runTaskloop(virtualConfig({ tasks: [{ name: "Z", steps: 2 }], intervalMs: 5 }), {
      out: () => {},
      err: () => {},
      clock,
    });

    expect(records).toEqual([
      { task: "Z", step: 1, atMs: 500 },
      { task: "Z", step: 2, atMs: 505 },
    ]);
  });

  it("reports a budget failure", async () => {
    const { outcome, records } = await runTaskloop(virtualConfig({ maxSteps: 4 }), { out: () => {}, err: () => {} });

    expect(outcome.tag === "Fail" && outcome.failure.reason).toBe("budget-exceeded");
    expect(records.map((r) => r.task)).toEqual(["A", "B", "A", "B"]);
  });
});

describe("clockFor", () => {
  it("picks a virtual clock starting at zero", () => {
    expect(clockFor(virtualConfig()).nowMs()).toBe(0);
  });
});
