// tests/unit/environment-lifecycle.test.ts - Environment lifecycle FSM, retries and teardown

import { describe, expect, test } from "vitest";
import { CancelledError, ConflictError } from "@testyard/contracts";
import { capabilityFromTemplate, type Capability } from "../../control/src/capability/model";
import { EnvironmentLifecycle } from "../../control/src/environment/lifecycle";
import { InvalidSpecError } from "../../control/src/platform/errors";
import type { ControlChannel, PlatformCallContext, PlatformHandle } from "../../control/src/platform/types";
import { lifecycleOptions, settleTeardown, type LifecycleHarness } from "../harness";
import { makeMockChannel, makeMockPlatform, mockQueue, type MockPlatform } from "../mock-platform";

function makeLifecycle(platform: MockPlatform, harness: LifecycleHarness = lifecycleOptions()) {
  const template = platform.declareTemplates()[0];
  return new EnvironmentLifecycle("env-1", platform, template, harness.options);
}

const HANDLE: PlatformHandle = { platform: "mock", id: "mock-env-1", template: "default", createdAt: 0 };

const PROVISIONED = ["Preparing", "Prepared", "Deploying", "Deployed", "Connecting", "Connected"];

// =============================================================================
// Provisioning
// =============================================================================

describe("provision", () => {
  test("happy path walks every state and tears down to Deleted", async () => {
    const channel = makeMockChannel("mock-env-1");
    const platform = makeMockPlatform({ connect: channel });
    const harness = lifecycleOptions();
    const lifecycle = makeLifecycle(platform, harness);

    const result = await lifecycle.provision();
    expect(result.kind).toBe("connected");
    expect(lifecycle.state).toBe("Connected");
    expect(lifecycle.environment.handle?.id).toBe("mock-env-1");
    expect(harness.states).toEqual(PROVISIONED);

    expect(lifecycle.beginTest()).toBe(channel);
    expect(lifecycle.state).toBe("Executing");
    lifecycle.endTest();
    expect(lifecycle.state).toBe("Connected");

    await lifecycle.teardown();
    expect(harness.states).toEqual([...PROVISIONED, "Executing", "Connected", "TearingDown", "Deleted"]);
    expect(lifecycle.environment.teardown).toBe("deleted");
    expect(lifecycle.pendingTeardown).toBeUndefined();
    expect(channel.closed).toBe(true);
    expect(platform.live.size).toBe(0);
  });

  test("deploy refines the declared capability", async () => {
    const platform = makeMockPlatform({ deploy: capabilityFromTemplate({ cores: 2 }) });
    const lifecycle = makeLifecycle(platform);
    await lifecycle.provision();
    expect(lifecycle.environment.capability).toEqual({
      cores: { kind: "range", min: 2, max: 2 },
      memoryMb: { kind: "range", min: 8192, max: 8192 },
    });
  });

  test("transient deploy failures are retried within the budget", async () => {
    const platform = makeMockPlatform({
      deploy: mockQueue<Capability>(new Error("flaky"), new Error("flaky"), {}),
    });
    const harness = lifecycleOptions();
    const lifecycle = makeLifecycle(platform, harness);

    const result = await lifecycle.provision();
    expect(result.kind).toBe("connected");
    expect(platform.callsFor("deploy").map((c) => c.attempt)).toEqual([1, 2, 3]);
    expect(platform.callsFor("prepare")).toHaveLength(1);
    expect(harness.states).toEqual(PROVISIONED);
  });

  test("exhausted deploy retries fail the environment after deleting what was prepared", async () => {
    const platform = makeMockPlatform({ deploy: new Error("flaky") });
    const harness = lifecycleOptions();
    const lifecycle = makeLifecycle(platform, harness);

    const result = await lifecycle.provision();
    expect(result.kind).toBe("failed");
    if (result.kind !== "failed") return;
    expect(result.code).toBe("DEPLOYMENT_FAILED");
    expect(result.error.message).toBe("deploy failed after 3 attempt(s): flaky");

    expect(platform.callsFor("deploy")).toHaveLength(3);
    expect(platform.callsFor("delete")).toHaveLength(1);
    expect(harness.states).toEqual(["Preparing", "Prepared", "Deploying", "TearingDown", "Failed"]);
    expect(lifecycle.environment.failure?.code).toBe("DEPLOYMENT_FAILED");
    expect(lifecycle.environment.teardown).toBe("deleted");
    expect(platform.live.size).toBe(0);
  });

  test("non-retryable prepare failure needs no delete", async () => {
    const platform = makeMockPlatform({ prepare: new InvalidSpecError("mock", "default", "bad image") });
    const harness = lifecycleOptions();
    const lifecycle = makeLifecycle(platform, harness);

    const result = await lifecycle.provision();
    expect(result.kind).toBe("failed");
    if (result.kind !== "failed") return;
    expect(result.code).toBe("PROVISIONING_FAILED");
    expect(result.error.message).toBe("prepare failed after 1 attempt(s): Invalid template default: bad image");

    expect(platform.callsFor("prepare")).toHaveLength(1);
    expect(platform.callsFor("delete")).toHaveLength(0);
    expect(harness.states).toEqual(["Preparing", "TearingDown", "Failed"]);
    expect(lifecycle.environment.teardown).toBe("not_required");
  });

  test("adapter call timeout is retried with the tighter timeout budget", async () => {
    const contexts: PlatformCallContext[] = [];
    const platform = makeMockPlatform({
      connect: (_handle, ctx) => {
        contexts.push(ctx);
        return new Promise<ControlChannel>(() => {});
      },
    });
    const lifecycle = makeLifecycle(platform, lifecycleOptions({ callTimeoutMs: 20 }));

    const result = await lifecycle.provision();
    expect(result.kind).toBe("failed");
    if (result.kind !== "failed") return;
    expect(result.code).toBe("CONNECTION_FAILED");
    expect(result.error.message).toBe("connect failed after 2 attempt(s): mock.connect timed out after 20ms");
    expect(contexts).toHaveLength(2);
    expect(contexts.every((ctx) => ctx.signal.aborted)).toBe(true);
    expect(lifecycle.state).toBe("Failed");
    expect(lifecycle.environment.teardown).toBe("deleted");
  });
});

// =============================================================================
// Cancellation
// =============================================================================

describe("cancellation", () => {
  test("cooperative cancel is observed between adapter calls", async () => {
    const harness = lifecycleOptions();
    const platform = makeMockPlatform({
      prepare: () => {
        harness.cancel.abort(new CancelledError("stop requested"));
        return HANDLE;
      },
    });
    const lifecycle = makeLifecycle(platform, harness);

    const result = await lifecycle.provision();
    expect(result).toEqual({ kind: "cancelled" });
    expect(platform.callsFor("deploy")).toHaveLength(0);
    expect(platform.callsFor("delete")).toHaveLength(1);
    expect(harness.states).toEqual(["Preparing", "Prepared", "TearingDown", "Deleted"]);
    expect(lifecycle.environment.teardown).toBe("deleted");
  });

  test("hard stop abandons an in-flight call and still deletes", async () => {
    const harness = lifecycleOptions();
    let deployCtx: PlatformCallContext | undefined;
    const platform = makeMockPlatform({
      deploy: (_handle, ctx) => {
        deployCtx = ctx;
        harness.hard.abort(new CancelledError("Run deadline exceeded"));
        return new Promise<Capability>(() => {});
      },
    });
    const lifecycle = makeLifecycle(platform, harness);

    const result = await lifecycle.provision();
    expect(result).toEqual({ kind: "cancelled" });
    expect(deployCtx?.signal.aborted).toBe(true);
    expect(harness.states).toEqual(["Preparing", "Prepared", "Deploying", "TearingDown", "Deleted"]);
    expect(platform.callsFor("delete")).toHaveLength(1);
    expect(platform.live.size).toBe(0);
  });
});

// =============================================================================
// Abandoned Calls
// =============================================================================

function lateAfter<T>(ms: number, value: T): Promise<T> {
  return new Promise<T>((resolve) => setTimeout(() => resolve(value), ms));
}

function handleFor(attempt: number): PlatformHandle {
  return { ...HANDLE, id: `mock-env-1-a${attempt}` };
}

describe("abandoned calls", () => {
  test("a handle from a timed-out prepare is deleted once teardown starts", async () => {
    const platform = makeMockPlatform({
      prepare: (_template, ctx) => (ctx.attempt === 1 ? lateAfter(100, handleFor(1)) : handleFor(2)),
    });
    const lifecycle = makeLifecycle(platform, lifecycleOptions({ callTimeoutMs: 20 }));

    const result = await lifecycle.provision();
    expect(result.kind).toBe("connected");
    expect(lifecycle.environment.handle?.id).toBe("mock-env-1-a2");

    await lifecycle.teardown();
    expect(lifecycle.pendingTeardown).toBeDefined();
    await settleTeardown(lifecycle);
    expect(platform.callsFor("delete").map((c) => c.target)).toEqual(["mock-env-1-a2", "mock-env-1-a1"]);
    expect(platform.live.size).toBe(0);
    expect(lifecycle.pendingTeardown).toBeUndefined();
  });

  test("a late handle that arrived before teardown is deleted with the environment", async () => {
    const platform = makeMockPlatform({
      prepare: (_template, ctx) => (ctx.attempt === 1 ? lateAfter(30, handleFor(1)) : handleFor(2)),
    });
    const lifecycle = makeLifecycle(platform, lifecycleOptions({ callTimeoutMs: 20 }));

    await lifecycle.provision();
    await lateAfter(60, undefined);
    expect([...platform.live].sort()).toEqual(["mock-env-1-a1", "mock-env-1-a2"]);

    await lifecycle.teardown();
    await settleTeardown(lifecycle);
    expect(platform.callsFor("delete").map((c) => c.target).sort()).toEqual(["mock-env-1-a1", "mock-env-1-a2"]);
    expect(platform.live.size).toBe(0);
    expect(lifecycle.state).toBe("Deleted");
  });

  test("late handles are reclaimed when every prepare attempt timed out", async () => {
    const platform = makeMockPlatform({
      prepare: (_template, ctx) => lateAfter(40, handleFor(ctx.attempt)),
    });
    const lifecycle = makeLifecycle(platform, lifecycleOptions({ callTimeoutMs: 20 }));

    const result = await lifecycle.provision();
    expect(result.kind).toBe("failed");
    expect(lifecycle.environment.teardown).toBe("not_required");

    await settleTeardown(lifecycle);
    expect(platform.callsFor("prepare")).toHaveLength(2);
    expect(platform.live.size).toBe(0);
  });

  test("a channel from a timed-out connect is closed when it arrives", async () => {
    const first = makeMockChannel("mock-env-1");
    const second = makeMockChannel("mock-env-1");
    const platform = makeMockPlatform({
      connect: (_handle, ctx) => (ctx.attempt === 1 ? lateAfter(100, first) : second),
    });
    const lifecycle = makeLifecycle(platform, lifecycleOptions({ callTimeoutMs: 20 }));

    const result = await lifecycle.provision();
    expect(result.kind).toBe("connected");
    expect(lifecycle.controlChannel).toBe(second);
    expect(lifecycle.pendingTeardown).toBeDefined();

    await settleTeardown(lifecycle);
    expect(first.closed).toBe(true);
    expect(second.closed).toBe(false);

    await lifecycle.teardown();
    expect(second.closed).toBe(true);
  });
});

// =============================================================================
// Teardown
// =============================================================================

describe("teardown", () => {
  test("failed delete marks the environment and retries in the background", async () => {
    const platform = makeMockPlatform({ delete: mockQueue<void>(new Error("busy"), undefined) });
    const lifecycle = makeLifecycle(platform);
    await lifecycle.provision();

    await lifecycle.teardown();
    expect(lifecycle.state).toBe("Failed");
    expect(lifecycle.environment.teardown).toBe("failed");
    expect(lifecycle.environment.failure).toEqual({ code: "TEARDOWN_FAILED", message: "delete failed: busy" });
    expect(lifecycle.pendingTeardown).toBeDefined();

    await settleTeardown(lifecycle);
    expect(lifecycle.environment.teardown).toBe("deleted");
    expect(lifecycle.state).toBe("Failed");
    expect(platform.callsFor("delete").map((c) => c.attempt)).toEqual([1, 2]);
    expect(platform.live.size).toBe(0);
  });

  test("teardown that never succeeds is reported as failed", async () => {
    const platform = makeMockPlatform({ delete: new Error("busy") });
    const lifecycle = makeLifecycle(platform);
    await lifecycle.provision();

    await lifecycle.teardown();
    await settleTeardown(lifecycle);
    expect(lifecycle.environment.teardown).toBe("failed");
    expect(platform.callsFor("delete")).toHaveLength(3);
    expect([...platform.live]).toEqual(["mock-env-1"]);
  });

  test("single teardown attempt leaves nothing in the background", async () => {
    const platform = makeMockPlatform({ delete: new Error("busy") });
    const lifecycle = makeLifecycle(platform, lifecycleOptions({ teardownRetry: { attempts: 1, delayMs: 0 } }));
    await lifecycle.provision();

    await lifecycle.teardown();
    expect(lifecycle.pendingTeardown).toBeUndefined();
    expect(platform.callsFor("delete")).toHaveLength(1);
  });

  test("teardown is idempotent", async () => {
    const platform = makeMockPlatform();
    const lifecycle = makeLifecycle(platform);
    await lifecycle.provision();

    await lifecycle.teardown();
    await lifecycle.teardown();
    expect(platform.callsFor("delete")).toHaveLength(1);
    expect(lifecycle.state).toBe("Deleted");
  });

  test("an environment that never started is discarded without adapter calls", async () => {
    const platform = makeMockPlatform();
    const harness = lifecycleOptions();
    const lifecycle = makeLifecycle(platform, harness);

    await lifecycle.teardown();
    expect(harness.states).toEqual(["Deleted"]);
    expect(lifecycle.environment.teardown).toBe("not_required");
    expect(platform.calls).toHaveLength(0);
  });
});

// =============================================================================
// Illegal use
// =============================================================================

describe("illegal use", () => {
  test("beginTest without a control channel is a conflict", () => {
    const lifecycle = makeLifecycle(makeMockPlatform());
    expect(() => lifecycle.beginTest()).toThrow(ConflictError);
  });

  test("endTest outside Executing is a conflict", async () => {
    const lifecycle = makeLifecycle(makeMockPlatform());
    await lifecycle.provision();
    expect(() => lifecycle.endTest()).toThrow("Illegal environment transition Connected -> Connected for env-1");
  });

  test("a terminal environment never provisions again", async () => {
    const lifecycle = makeLifecycle(makeMockPlatform());
    lifecycle.discard();
    await expect(lifecycle.provision()).rejects.toBeInstanceOf(ConflictError);
  });
});
