// platform/ready.ts - Pass-through platform for machines that already exist
//
// Nothing is created or destroyed: prepare reserves a configured target,
// deploy optionally probes it over SSH, delete releases the reservation.

import type { CapabilityDeclaration } from "../capability/schema";
import {
  capabilityFromIntrospection,
  capabilityFromTemplate,
  type Capability,
  type HostFacts,
} from "../capability/model";
import { CapacityError, InvalidSpecError, PlatformOperationError } from "./errors";
import { connectSsh, type SshConnector, type SshTarget } from "./ssh";
import type {
  ControlChannel,
  PlatformAdapter,
  PlatformCallContext,
  PlatformHandle,
  Template,
} from "./types";

// =============================================================================
// Types
// =============================================================================

export interface ReadyTarget extends SshTarget {
  name: string;
  capability: CapabilityDeclaration;
  /** Probe cores/memory/arch over SSH during deploy */
  introspect: boolean;
}

export interface ReadyPlatformConfig {
  targets: ReadyTarget[];
  /** For tests only: replace the ssh2 connector. */
  _connectFactory?: SshConnector;
}

export const READY_PLATFORM = "ready";

const PROBE_SCRIPT = [
  "echo cores=$(nproc)",
  "echo mem_kb=$(awk '/MemTotal/{print $2}' /proc/meminfo)",
  "echo arch=$(uname -m)",
  "echo os=$(uname -s | tr '[:upper:]' '[:lower:]')",
].join("; ");

// =============================================================================
// Probe Parsing
// =============================================================================

/** Parse `key=value` lines printed by the probe script. */
export function parseProbeOutput(stdout: string, platform: string): HostFacts {
  const facts: HostFacts = { platform };
  for (const line of stdout.split("\n")) {
    const eq = line.indexOf("=");
    if (eq === -1) continue;
    const key = line.slice(0, eq).trim();
    const value = line.slice(eq + 1).trim();
    if (!value) continue;
    switch (key) {
      case "cores":
        facts.cores = parseInt(value, 10);
        break;
      case "mem_kb":
        facts.memoryMb = Math.floor(parseInt(value, 10) / 1024);
        break;
      case "arch":
        facts.arch = value;
        break;
      case "os":
        facts.os = value;
        break;
    }
  }
  return facts;
}

// =============================================================================
// Platform
// =============================================================================

export class ReadyPlatform implements PlatformAdapter {
  readonly name = READY_PLATFORM;
  private readonly targets: Map<string, ReadyTarget>;
  private readonly templates: Template[];
  private readonly reserved = new Map<string, string>();
  private readonly connector: SshConnector;

  constructor(config: ReadyPlatformConfig) {
    this.targets = new Map(config.targets.map((t) => [t.name, t]));
    this.templates = config.targets.map((target) => ({
      name: target.name,
      capability: capabilityFromTemplate({ platform: READY_PLATFORM, ...target.capability }),
      spec: { host: target.host, port: target.port },
    }));
    this.connector = config._connectFactory ?? connectSsh;
  }

  declareTemplates(): Template[] {
    return this.templates;
  }

  async prepare(template: Template, ctx: PlatformCallContext): Promise<PlatformHandle> {
    const target = this.targets.get(template.name);
    if (!target) {
      throw new InvalidSpecError(this.name, template.name, "no such ready target");
    }
    const holder = this.reserved.get(target.name);
    if (holder !== undefined && holder !== ctx.environmentId) {
      throw new CapacityError(this.name, template.name);
    }
    this.reserved.set(target.name, ctx.environmentId);
    return {
      platform: this.name,
      id: target.name,
      template: template.name,
      createdAt: Date.now(),
      metadata: { host: target.host, port: target.port },
    };
  }

  async deploy(handle: PlatformHandle, ctx: PlatformCallContext): Promise<Capability> {
    const target = this.requireTarget(handle);
    if (!target.introspect) return {};

    const channel = await this.connector(target, { signal: ctx.signal });
    try {
      const result = await channel.execute(PROBE_SCRIPT, { timeoutMs: 30_000, signal: ctx.signal });
      if (result.exitCode !== 0) {
        throw new PlatformOperationError(this.name, "PLATFORM_INTERNAL", `Probe failed on ${channel.target}: ${result.stderr.trim()}`, {
          retryable: true,
          details: { exitCode: result.exitCode },
        });
      }
      return capabilityFromIntrospection(parseProbeOutput(result.stdout, READY_PLATFORM));
    } finally {
      await channel.close();
    }
  }

  async connect(handle: PlatformHandle, ctx: PlatformCallContext): Promise<ControlChannel> {
    return this.connector(this.requireTarget(handle), { signal: ctx.signal });
  }

  async delete(handle: PlatformHandle, ctx: PlatformCallContext): Promise<void> {
    if (this.reserved.get(handle.id) === ctx.environmentId) {
      this.reserved.delete(handle.id);
    }
  }

  private requireTarget(handle: PlatformHandle): ReadyTarget {
    const target = this.targets.get(handle.id);
    if (!target) {
      throw new PlatformOperationError(this.name, "NOT_FOUND", `Ready target not found: ${handle.id}`);
    }
    return target;
  }
}
