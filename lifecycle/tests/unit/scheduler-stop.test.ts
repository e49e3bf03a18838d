// tests/unit/scheduler-stop.test.ts - Cancellation, run deadline, concurrency bound and fatal errors

import { describe, expect, test } from "vitest";
import { SchedulerFatalError } from "@testyard/contracts";
import type { Capability } from "../../control/src/capability/model";
import type { PlatformHandle } from "../../control/src/platform/types";
import { Scheduler } from "../../control/src/runner/scheduler";
import { TEST_RUN_CONFIG, fastSleep, makeScheduler, makeTest, recordEvents } from "../harness";
import { makeMockPlatform } from "../mock-platform";

const HANDLE: PlatformHandle = { platform: "mock", id: "mock-env-1", template: "default", createdAt: 0 };

const TWO_OS_TEMPLATES = [
  { name: "linux", capability: { os: "linux" } },
  { name: "windows", capability: { os: "windows" } },
];

// =============================================================================
// Cancellation
// =============================================================================

describe("cancellation", () => {
  test("cancel discards environments that never got a slot", async () => {
    const platform = makeMockPlatform({ templates: TWO_OS_TEMPLATES });
    const scheduler = await makeScheduler([platform]);
    const events = recordEvents(scheduler);

    const report = await scheduler.run([
      makeTest("c.first", { os: "linux" }, {
        run: async () => {
          scheduler.cancel("operator stop");
        },
      }),
      makeTest("c.second", { os: "windows" }),
    ]);

    expect(report.cancelled).toBe(true);
    expect(report.cancelReason).toBe("operator stop");
    expect(report.tests.map((t) => [t.testId, t.status, t.reason])).toEqual([
      ["c.first", "Completed", undefined],
      ["c.second", "Cancelled", "CANCELLED"],
    ]);
    expect(report.tests[1]?.message).toBe("operator stop");
    expect(events.path("env-2")).toEqual(["Deleted"]);
    expect(report.environments.map((e) => [e.id, e.state, e.teardown])).toEqual([
      ["env-1", "Deleted", "deleted"],
      ["env-2", "Deleted", "not_required"],
    ]);
    expect(platform.callsFor("prepare")).toHaveLength(1);
  });

  test("remaining tests on a live environment are cancelled, the environment is torn down", async () => {
    const platform = makeMockPlatform();
    const scheduler = await makeScheduler([platform]);

    const report = await scheduler.run([
      makeTest("q.one", {}, {
        run: async () => {
          scheduler.cancel();
        },
      }),
      makeTest("q.two"),
      makeTest("q.three"),
    ]);

    expect(report.tests.map((t) => t.status)).toEqual(["Completed", "Cancelled", "Cancelled"]);
    expect(report.environments[0]?.state).toBe("Deleted");
    expect(platform.live.size).toBe(0);
  });

  test("external signal cancels the run and running tests see it", async () => {
    const controller = new AbortController();
    const scheduler = await makeScheduler([makeMockPlatform()]);

    const report = await scheduler.run(
      [
        makeTest("x.watch", {}, {
          run: async (ctx) => {
            controller.abort();
            ctx.signal.throwIfAborted();
          },
        }),
      ],
      { signal: controller.signal }
    );

    expect(report.tests[0]).toMatchObject({
      status: "Cancelled",
      reason: "CANCELLED",
      message: "Run cancelled by caller",
    });
    expect(report.cancelReason).toBe("Run cancelled by caller");
  });

  test("an already aborted signal cancels every test without provisioning", async () => {
    const controller = new AbortController();
    controller.abort();
    const platform = makeMockPlatform();
    const scheduler = await makeScheduler([platform]);

    const report = await scheduler.run([makeTest("y.one"), makeTest("y.two")], { signal: controller.signal });

    expect(report.summary).toEqual({ total: 2, Completed: 0, Failed: 0, Skipped: 0, Cancelled: 2 });
    expect(report.environments).toEqual([]);
    expect(platform.calls).toHaveLength(0);
  });

  test("work submitted after cancel is cancelled immediately", async () => {
    const scheduler = await makeScheduler([makeMockPlatform()]);

    const report = await scheduler.run([
      makeTest("z.one", {}, {
        run: async () => {
          scheduler.cancel("enough");
          scheduler.submit([makeTest("z.late")]);
        },
      }),
    ]);

    expect(report.tests.map((t) => [t.testId, t.status, t.message])).toEqual([
      ["z.one", "Completed", undefined],
      ["z.late", "Cancelled", "enough"],
    ]);
  });
});

// =============================================================================
// Deadline
// =============================================================================

describe("run deadline", () => {
  test("deadline abandons a hung test and still tears everything down", async () => {
    const platform = makeMockPlatform();
    const scheduler = await makeScheduler([platform], { runDeadlineMs: 100, adapterCallTimeoutMs: 50 });

    const report = await scheduler.run([
      makeTest("h.hung", {}, { run: () => new Promise<void>(() => {}) }),
      makeTest("h.after"),
    ]);

    expect(report.deadlineExceeded).toBe(true);
    expect(report.cancelled).toBe(true);
    expect(report.tests.map((t) => [t.testId, t.status, t.message])).toEqual([
      ["h.hung", "Cancelled", "Run deadline exceeded"],
      ["h.after", "Cancelled", "Run deadline exceeded"],
    ]);
    expect(report.environments[0]).toMatchObject({ state: "Deleted", teardown: "deleted" });
    expect(platform.live.size).toBe(0);
  });

  test("deadline during a hung adapter call abandons provisioning", async () => {
    // prepare finishes at ~40ms, so the hung deploy would only time out after the deadline
    const platform = makeMockPlatform({
      prepare: () => new Promise<PlatformHandle>((resolve) => setTimeout(() => resolve(HANDLE), 40)),
      deploy: () => new Promise<Capability>(() => {}),
    });
    const scheduler = await makeScheduler([platform], { runDeadlineMs: 100, adapterCallTimeoutMs: 90, retryAttempts: 1 });

    const report = await scheduler.run([makeTest("h.one")]);

    expect(report.deadlineExceeded).toBe(true);
    expect(report.tests[0]?.status).toBe("Cancelled");
    expect(report.environments[0]).toMatchObject({ state: "Deleted", teardown: "deleted" });
    expect(platform.callsFor("delete")).toHaveLength(1);
  });

  test("handles from timed-out prepare calls are deleted before the report", async () => {
    const platform = makeMockPlatform({
      prepare: (template, ctx) => {
        const handle = { ...HANDLE, id: `mock-${ctx.environmentId}-a${ctx.attempt}`, template: template.name };
        if (ctx.attempt > 1) return handle;
        return new Promise<PlatformHandle>((resolve) => setTimeout(() => resolve(handle), 60));
      },
    });
    // real sleep, so the teardown grace period actually waits
    const scheduler = new Scheduler({ config: { ...TEST_RUN_CONFIG, adapterCallTimeoutMs: 20 } });
    await scheduler.registerPlatform(platform);

    const report = await scheduler.run([makeTest("h.late")]);

    expect(report.tests[0]?.status).toBe("Completed");
    expect(platform.callsFor("prepare")).toHaveLength(2);
    expect(platform.callsFor("delete")).toHaveLength(2);
    expect(platform.live.size).toBe(0);
  });
});

// =============================================================================
// Concurrency
// =============================================================================

describe("concurrency bound", () => {
  test("never more environments hold resources than the bound", async () => {
    const platform = makeMockPlatform({
      deploy: () => new Promise<Capability>((resolve) => setTimeout(() => resolve({}), 5)),
    });
    const scheduler = await makeScheduler([platform], { concurrency: 2, environmentCapacity: 1 });

    let holding = 0;
    let peak = 0;
    scheduler.events.on("environment_state_changed", ({ from, to }) => {
      if (from === "New" && to === "Preparing") holding++;
      if (from !== "New" && (to === "Deleted" || to === "Failed")) holding--;
      peak = Math.max(peak, holding);
    });

    const report = await scheduler.run(["k.1", "k.2", "k.3", "k.4", "k.5"].map((id) => makeTest(id)));

    expect(peak).toBe(2);
    expect(holding).toBe(0);
    expect(report.environments).toHaveLength(5);
    expect(report.summary.Completed).toBe(5);
  });

  test("concurrency of one runs environments strictly one after another", async () => {
    const platform = makeMockPlatform({ templates: TWO_OS_TEMPLATES });
    const scheduler = await makeScheduler([platform]);
    const events = recordEvents(scheduler);

    await scheduler.run([makeTest("s.lin", { os: "linux" }), makeTest("s.win", { os: "windows" })]);

    const edges = events.edges();
    expect(edges.indexOf("env-1:TearingDown->Deleted")).toBeLessThan(edges.indexOf("env-2:New->Preparing"));
  });
});

// =============================================================================
// Fatal errors
// =============================================================================

describe("scheduler fatal", () => {
  test("an internal error aborts the run with SchedulerFatalError", async () => {
    const platform = makeMockPlatform();
    const scheduler = new Scheduler({
      config: TEST_RUN_CONFIG,
      sleep: fastSleep,
      slackMetric: () => {
        throw new Error("metric exploded");
      },
    });
    await scheduler.registerPlatform(platform);

    const run = scheduler.run([makeTest("f.one")]);
    await expect(run).rejects.toBeInstanceOf(SchedulerFatalError);
    await expect(run).rejects.toThrow("Scheduler invariant violated: metric exploded");
    expect(scheduler.activeEnvironments).toBe(0);
    expect(platform.calls).toHaveLength(0);
  });
});
