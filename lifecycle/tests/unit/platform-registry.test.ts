// tests/unit/platform-registry.test.ts - Registration, lookup, template order, hooks

import { afterEach, describe, expect, test, vi } from "vitest";
import { PlatformRegistry } from "../../control/src/platform/registry";
import { makeMockPlatform } from "../mock-platform";
import { makeScheduler } from "../harness";

describe("PlatformRegistry", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("lookup by name; unknown names are not found", async () => {
    const registry = new PlatformRegistry();
    const alpha = makeMockPlatform({ name: "alpha" });
    await registry.register({ adapter: alpha });

    expect(registry.get("alpha")).toBe(alpha);
    expect(registry.has("beta")).toBe(false);
    expect(() => registry.get("beta")).toThrow("Platform 'beta' not found in registry");
  });

  test("a name registers once", async () => {
    const registry = new PlatformRegistry();
    await registry.register({ adapter: makeMockPlatform({ name: "alpha" }) });

    await expect(registry.register({ adapter: makeMockPlatform({ name: "alpha" }) })).rejects.toMatchObject({
      code: "PLATFORM_ALREADY_REGISTERED",
      category: "conflict",
    });
    expect(registry.names()).toEqual(["alpha"]);
  });

  test("templates come in registration then declaration order", async () => {
    const registry = new PlatformRegistry();
    await registry.register({
      adapter: makeMockPlatform({
        name: "beta",
        templates: [
          { name: "b1", capability: { cores: 1 } },
          { name: "b2", capability: { cores: 2 } },
        ],
      }),
    });
    await registry.register({ adapter: makeMockPlatform({ name: "alpha" }) });

    expect(registry.templates().map(({ adapter, template }) => `${adapter.name}/${template.name}`)).toEqual([
      "beta/b1",
      "beta/b2",
      "alpha/default",
    ]);
  });

  test("a failing startup hook fails the registration", async () => {
    const registry = new PlatformRegistry();
    await expect(
      registry.register({
        adapter: makeMockPlatform({ name: "alpha" }),
        hooks: { onStartup: async () => Promise.reject(new Error("no daemon")) },
      })
    ).rejects.toThrow("no daemon");
    expect(registry.has("alpha")).toBe(false);
  });

  test("shutdown runs every onShutdown hook and empties the registry", async () => {
    const errors = vi.spyOn(console, "error").mockImplementation(() => {});
    const shutdowns: string[] = [];
    const scheduler = await makeScheduler([]);
    await scheduler.registerPlatform(makeMockPlatform({ name: "alpha" }), {
      onShutdown: async () => {
        shutdowns.push("alpha");
        throw new Error("already gone");
      },
    });
    await scheduler.registerPlatform(makeMockPlatform({ name: "beta" }), {
      onShutdown: async () => {
        shutdowns.push("beta");
      },
    });

    await scheduler.shutdown();

    expect(shutdowns).toEqual(["alpha", "beta"]);
    expect(scheduler.platforms.names()).toEqual([]);
    expect(errors).toHaveBeenCalledTimes(1);
  });

  test("unregistering an unknown name is a no-op", async () => {
    await expect(new PlatformRegistry().unregister("ghost")).resolves.toBeUndefined();
  });
});
