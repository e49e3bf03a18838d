// platform/registry.ts - Platform Registry & Dispatch
//
// Owned by one Scheduler instance; there is no module-level registry, so two
// schedulers in one process never see each other's adapters.

import { TestyardError } from "@testyard/contracts";
import type { PlatformAdapter, PlatformLifecycleHooks, PlatformName, Template } from "./types";

// =============================================================================
// Types
// =============================================================================

export interface PlatformRegistration {
  adapter: PlatformAdapter;
  hooks?: PlatformLifecycleHooks;
}

export interface RegisteredTemplate {
  adapter: PlatformAdapter;
  template: Template;
}

// =============================================================================
// Registry
// =============================================================================

export class PlatformRegistry {
  private readonly registrations = new Map<PlatformName, PlatformRegistration>();

  async register(registration: PlatformRegistration): Promise<void> {
    const { adapter, hooks } = registration;
    if (this.registrations.has(adapter.name)) {
      throw new TestyardError(
        "PLATFORM_ALREADY_REGISTERED",
        `Platform '${adapter.name}' is already registered`,
        "conflict"
      );
    }

    // A failing startup hook fails the registration
    if (hooks?.onStartup) {
      await hooks.onStartup();
    }

    this.registrations.set(adapter.name, registration);
  }

  async unregister(name: PlatformName): Promise<void> {
    const registration = this.registrations.get(name);
    if (!registration) return;
    this.registrations.delete(name);
    if (registration.hooks?.onShutdown) {
      await registration.hooks.onShutdown();
    }
  }

  get(name: PlatformName): PlatformAdapter {
    const registration = this.registrations.get(name);
    if (!registration) {
      throw new TestyardError("PLATFORM_NOT_FOUND", `Platform '${name}' not found in registry`, "not_found");
    }
    return registration.adapter;
  }

  has(name: string): boolean {
    return this.registrations.has(name);
  }

  names(): PlatformName[] {
    return [...this.registrations.keys()];
  }

  /**
   * Every declared template across all adapters, in registration order then
   * declaration order. This order is the matcher's final tie-break.
   */
  templates(): RegisteredTemplate[] {
    const result: RegisteredTemplate[] = [];
    for (const { adapter } of this.registrations.values()) {
      for (const template of adapter.declareTemplates()) {
        result.push({ adapter, template });
      }
    }
    return result;
  }

  /** Run every onShutdown hook. Failures are logged, not thrown. */
  async shutdown(): Promise<void> {
    const names = this.names();
    for (const name of names) {
      try {
        await this.unregister(name);
      } catch (err) {
        console.error(`[platform] onShutdown hook failed for ${name}:`, err);
      }
    }
  }
}
