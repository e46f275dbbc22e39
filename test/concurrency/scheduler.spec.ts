// test/concurrency/scheduler.spec.ts
// Scheduler: ordering, suspension, cancellation, budgets, invariants

import { describe, it, expect } from "vitest";
import type { ClockPort } from "../../src/ports/clock";
import { createVirtualClock, createSystemClock } from "../../src/adapters/clock";
import { memoryRecordSink } from "../../src/adapters/sinks";
import {
  type StepContext,
  type TaskBody,
  createScheduler,
  spawnTask,
  cancelTask,
  getTask,
  runScheduler,
  drainScheduler,
  getSchedulerStatus,
  taskStatuses,
  printerTask,
  countdownBody,
  suspend,
  complete,
  SchedulerInvariantError,
} from "../../src/core/concurrency";

function recordingBody(log: string[], name: string, steps: number, intervalMs: number): TaskBody {
  return countdownBody(steps, intervalMs, (ctx: StepContext) => {
    log.push(`${name}${ctx.step}@${ctx.nowMs}`);
  });
}

describe("spawnTask", () => {
  it("should register tasks as pending in submission order", () => {
    const scheduler = createScheduler({ clock: createVirtualClock() });
    const a = spawnTask(scheduler, { name: "A", body: recordingBody([], "A", 1, 0) });
    const b = spawnTask(scheduler, { name: "B", body: recordingBody([], "B", 1, 0) });

    expect(a.id).toBe(0);
    expect(b.id).toBe(1);
    expect(a.status()).toBe("pending");
    expect(scheduler.readyQueue).toEqual([0, 1]);
    expect(scheduler.sleeping).toEqual([]);
    expect(getSchedulerStatus(scheduler)).toEqual({ tag: "ready", count: 2 });
  });

  it("should record a spawn event", () => {
    const scheduler = createScheduler({ clock: createVirtualClock(42) });
    spawnTask(scheduler, { name: "A", body: recordingBody([], "A", 1, 0) });

    expect(scheduler.ledger).toEqual([{ tag: "spawn", taskId: 0, name: "A", atMs: 42 }]);
  });
});

describe("runScheduler ordering", () => {
  it("should resume simultaneously ready tasks in submission order", async () => {
    const log: string[] = [];
    const scheduler = createScheduler({ clock: createVirtualClock() });
    spawnTask(scheduler, { name: "A", body: recordingBody(log, "A", 3, 100) });
    spawnTask(scheduler, { name: "B", body: recordingBody(log, "B", 3, 100) });

    await runScheduler(scheduler);

    expect(log).toEqual(["A1@0", "B1@0", "A2@100", "B2@100", "A3@200", "B3@200"]);
  });

  it("should resume earlier wake times first", async () => {
    const log: string[] = [];
    const scheduler = createScheduler({ clock: createVirtualClock() });
    spawnTask(scheduler, { name: "A", body: recordingBody(log, "A", 3, 300) });
    spawnTask(scheduler, { name: "B", body: recordingBody(log, "B", 3, 100) });

    await runScheduler(scheduler);

    expect(log).toEqual(["A1@0", "B1@0", "B2@100", "B3@200", "A2@300", "A3@600"]);
  });

  it("should keep the sleeping set ordered by wake time then id", () => {
    const scheduler = createScheduler({ clock: createVirtualClock() });
    spawnTask(scheduler, { name: "slow", body: recordingBody([], "slow", 2, 500) });
    spawnTask(scheduler, { name: "fast", body: recordingBody([], "fast", 2, 100) });
    spawnTask(scheduler, { name: "same", body: recordingBody([], "same", 2, 500) });

    // first pass runs synchronously up to the first sleep
    const run = runScheduler(scheduler);

    expect(scheduler.sleeping).toEqual([1, 0, 2]);
    expect(getSchedulerStatus(scheduler)).toEqual({ tag: "sleeping", untilMs: 100 });
    return run;
  });

  it("should never resume a task before its wake time on the system clock", async () => {
    const times: number[] = [];
    const scheduler = createScheduler({ clock: createSystemClock() });
    spawnTask(scheduler, {
      name: "T",
      body: countdownBody(3, 15, (ctx) => {
        times.push(ctx.nowMs);
      }),
    });

    await runScheduler(scheduler);

    expect(times).toHaveLength(3);
    expect(times[1] - times[0]).toBeGreaterThanOrEqual(15);
    expect(times[2] - times[1]).toBeGreaterThanOrEqual(15);
  });

  it("should run a task submitted while the driver sleeps at the current instant", async () => {
    const clock = createVirtualClock();
    const log: string[] = [];
    const scheduler = createScheduler({ clock });
    spawnTask(scheduler, { name: "X", body: recordingBody(log, "X", 2, 1000) });

    const run = runScheduler(scheduler);
    spawnTask(scheduler, { name: "Y", body: recordingBody(log, "Y", 1, 0) });
    await run;

    expect(log).toEqual(["X1@0", "Y1@0", "X2@1000"]);
  });

  it("should end with an empty run-set", async () => {
    const scheduler = createScheduler({ clock: createVirtualClock() });
    spawnTask(scheduler, { name: "A", body: recordingBody([], "A", 2, 10) });

    await runScheduler(scheduler);

    expect(getSchedulerStatus(scheduler)).toEqual({ tag: "done" });
    expect(scheduler.readyQueue).toEqual([]);
    expect(scheduler.sleeping).toEqual([]);
    expect(scheduler.running).toBeUndefined();
  });

  it("should return immediately when nothing was submitted", async () => {
    const scheduler = createScheduler({ clock: createVirtualClock() });
    await runScheduler(scheduler);
    expect(scheduler.ledger).toEqual([]);
  });

  it("should join the active driver instead of starting a second one", async () => {
    const scheduler = createScheduler({ clock: createVirtualClock() });
    spawnTask(scheduler, { name: "A", body: recordingBody([], "A", 2, 10) });

    const first = runScheduler(scheduler);
    const second = runScheduler(scheduler);

    expect(second).toBe(first);
    await first;
  });
});

describe("trace ledger", () => {
  it("should record every transition of a two-step task", async () => {
    const scheduler = createScheduler({ clock: createVirtualClock() });
    spawnTask(scheduler, { name: "T", body: recordingBody([], "T", 2, 10) });

    await runScheduler(scheduler);

    expect(scheduler.ledger).toEqual([
      { tag: "spawn", taskId: 0, name: "T", atMs: 0 },
      { tag: "resume", taskId: 0, name: "T", step: 1, atMs: 0 },
      { tag: "suspend", taskId: 0, name: "T", wakeAtMs: 10, atMs: 0 },
      { tag: "sleep", untilMs: 10, atMs: 0 },
      { tag: "resume", taskId: 0, name: "T", step: 2, atMs: 10 },
      { tag: "complete", taskId: 0, name: "T", steps: 2, atMs: 10 },
    ]);
  });

  it("should forward events to the trace sink", async () => {
    const tags: string[] = [];
    const scheduler = createScheduler({
      clock: createVirtualClock(),
      trace: { emit: (e) => tags.push(e.tag) },
    });
    spawnTask(scheduler, { name: "T", body: recordingBody([], "T", 1, 10) });

    await runScheduler(scheduler);

    expect(tags).toEqual(["spawn", "resume", "complete"]);
  });
});

describe("task failure", () => {
  it("should fail only the throwing task and keep running the others", async () => {
    const sink = memoryRecordSink();
    const scheduler = createScheduler({ clock: createVirtualClock() });
    const a = spawnTask(scheduler, printerTask({ name: "A", steps: 3, intervalMs: 10, sink }));
    const b = spawnTask(scheduler, printerTask({ name: "B", steps: 3, intervalMs: 10, sink, failAt: 2 }));

    await runScheduler(scheduler);

    expect(sink.names()).toEqual(["A", "B", "A", "A"]);
    expect(a.status()).toBe("completed");
    expect(b.status()).toBe("failed");

    const outcome = await b.settled;
    expect(outcome.tag).toBe("Fail");
    if (outcome.tag === "Fail") {
      expect(outcome.failure.reason).toBe("task-failed");
      expect(outcome.failure.message).toBe("Task B failed at step 2: B failed at step 2");
      expect(outcome.failure.context).toEqual({ task: "B", step: 2 });
    }
  });

  it("should fail a task that asks for a negative suspension", async () => {
    const scheduler = createScheduler({ clock: createVirtualClock() });
    const handle = spawnTask(scheduler, { name: "bad", body: { resume: () => suspend(-1) } });

    await runScheduler(scheduler);

    const outcome = await handle.settled;
    expect(handle.status()).toBe("failed");
    expect(outcome.tag === "Fail" && outcome.failure.reason).toBe("invalid-suspension");
  });

  it("should settle completed tasks with Done", async () => {
    const scheduler = createScheduler({ clock: createVirtualClock() });
    const handle = spawnTask(scheduler, { name: "once", body: { resume: () => complete() } });

    await runScheduler(scheduler);

    await expect(handle.settled).resolves.toEqual({ tag: "Done", value: undefined, meta: { atMs: 0 } });
  });
});

describe("cancellation", () => {
  it("should cancel a pending task before it ever runs", async () => {
    const log: string[] = [];
    const scheduler = createScheduler({ clock: createVirtualClock() });
    const a = spawnTask(scheduler, { name: "A", body: recordingBody(log, "A", 2, 10) });

    expect(a.cancel()).toBe(true);
    await runScheduler(scheduler);

    expect(log).toEqual([]);
    expect(a.status()).toBe("cancelled");
    const outcome = await a.settled;
    expect(outcome.tag === "Fail" && outcome.failure.reason).toBe("cancelled");
  });

  it("should cancel a suspended task between steps", async () => {
    const log: string[] = [];
    const scheduler = createScheduler({ clock: createVirtualClock() });
    const a = spawnTask(scheduler, { name: "A", body: recordingBody(log, "A", 3, 10) });
    spawnTask(scheduler, {
      name: "killer",
      body: countdownBody(2, 15, (ctx) => {
        if (ctx.step === 2) cancelTask(scheduler, a.id);
      }),
    });

    await runScheduler(scheduler);

    expect(log).toEqual(["A1@0", "A2@10"]);
    expect(a.status()).toBe("cancelled");
  });

  it("should cancel a running task at its next suspension point", async () => {
    const log: string[] = [];
    const scheduler = createScheduler({ clock: createVirtualClock() });
    let selfId = -1;
    const handle = spawnTask(scheduler, {
      name: "self",
      body: countdownBody(3, 10, (ctx) => {
        log.push(`step${ctx.step}`);
        if (ctx.step === 1) cancelTask(scheduler, selfId);
      }),
    });
    selfId = handle.id;

    await runScheduler(scheduler);

    expect(log).toEqual(["step1"]);
    expect(handle.status()).toBe("cancelled");
    expect(scheduler.ledger.at(-1)).toEqual({ tag: "cancel", taskId: 0, name: "self", from: "running", atMs: 0 });
  });

  it("should let a running task complete when its last step asks to cancel it", async () => {
    const scheduler = createScheduler({ clock: createVirtualClock() });
    let accepted: boolean | undefined;
    const handle = spawnTask(scheduler, {
      name: "last",
      body: countdownBody(1, 10, () => {
        accepted = cancelTask(scheduler, 0);
      }),
    });

    await runScheduler(scheduler);

    expect(accepted).toBe(true);
    expect(handle.status()).toBe("completed");
    expect((await handle.settled).tag).toBe("Done");
  });

  it("should leave finished tasks alone", async () => {
    const scheduler = createScheduler({ clock: createVirtualClock() });
    const a = spawnTask(scheduler, { name: "A", body: recordingBody([], "A", 1, 0) });
    await runScheduler(scheduler);

    expect(a.cancel()).toBe(false);
    expect(a.status()).toBe("completed");
    expect(cancelTask(scheduler, 99)).toBe(false);
  });
});

describe("step budget", () => {
  it("should fail remaining tasks once maxSteps resumptions have run", async () => {
    const sink = memoryRecordSink();
    const scheduler = createScheduler({ clock: createVirtualClock(), maxSteps: 3 });
    const a = spawnTask(scheduler, printerTask({ name: "A", steps: 5, intervalMs: 10, sink }));

    await runScheduler(scheduler);

    expect(sink.names()).toEqual(["A", "A", "A"]);
    expect(a.status()).toBe("failed");
    const outcome = await a.settled;
    expect(outcome.tag === "Fail" && outcome.failure.reason).toBe("budget-exceeded");
    expect(scheduler.stepCount).toBe(3);
  });
});

describe("invariants", () => {
  it("should refuse to resume a task before its wake time", async () => {
    let now = 100;
    const clock: ClockPort = {
      nowMs: () => now,
      sleepUntil: async () => {},
    };
    const scheduler = createScheduler({ clock });
    spawnTask(scheduler, { name: "A", body: recordingBody([], "A", 1, 0) });
    now = 50;

    await expect(runScheduler(scheduler)).rejects.toBeInstanceOf(SchedulerInvariantError);
    expect(scheduler.driving).toBe(false);
  });

  it("should refuse to resume a task that already finished", async () => {
    const scheduler = createScheduler({ clock: createVirtualClock() });
    const a = spawnTask(scheduler, { name: "A", body: recordingBody([], "A", 1, 0) });
    const state = getTask(scheduler, a.id);
    if (state) state.status = "completed";

    await expect(runScheduler(scheduler)).rejects.toThrow("Scheduler invariant violated: task A resumed while completed");
  });
});

describe("independent schedulers", () => {
  it("should run side by side without sharing state", async () => {
    const left: string[] = [];
    const right: string[] = [];
    const s1 = createScheduler({ clock: createVirtualClock(), name: "left" });
    const s2 = createScheduler({ clock: createVirtualClock(1000), name: "right" });
    spawnTask(s1, { name: "L", body: recordingBody(left, "L", 2, 5) });
    spawnTask(s2, { name: "R", body: recordingBody(right, "R", 3, 7) });

    await Promise.all([runScheduler(s1), runScheduler(s2)]);

    expect(left).toEqual(["L1@0", "L2@5"]);
    expect(right).toEqual(["R1@1000", "R2@1007", "R3@1014"]);
    expect(taskStatuses(s1)).toEqual([{ id: 0, name: "L", status: "completed" }]);
    expect(taskStatuses(s2)).toEqual([{ id: 0, name: "R", status: "completed" }]);
  });
});

describe("drainScheduler", () => {
  it("should wait until every submitted task has finished", async () => {
    const scheduler = createScheduler({ clock: createVirtualClock() });
    const a = spawnTask(scheduler, { name: "A", body: recordingBody([], "A", 3, 10) });

    await drainScheduler(scheduler);

    expect(a.status()).toBe("completed");
    expect(scheduler.driving).toBe(false);
  });
});
