// platform/types.ts - Platform Adapter Interface & Type Definitions
// Fully defined types (no stubs needed for type-only files)

import type { EnvironmentId, PlatformName } from "@testyard/contracts";
import type { Capability } from "../capability/model";

// Re-export PlatformName for convenience
export type { PlatformName };

// =============================================================================
// Platform Adapter Interface
// =============================================================================

/**
 * One implementation per backend (cloud, hypervisor, bare metal, container,
 * pass-through "ready" targets). The lifecycle manager only talks to this
 * interface. Every call may block on I/O and must be independently retryable:
 * a retried prepare/deploy/connect must not duplicate resources already held
 * under the same handle, and delete must succeed on an already-deleted handle.
 */
export interface PlatformAdapter {
  readonly name: PlatformName;

  /** Capability templates this platform can provision, in preference order. */
  declareTemplates(): Template[];

  /** Validate the template and reserve (but do not instantiate) resources. */
  prepare(template: Template, ctx: PlatformCallContext): Promise<PlatformHandle>;

  /** Instantiate resources; return the measured capability. */
  deploy(handle: PlatformHandle, ctx: PlatformCallContext): Promise<Capability>;

  /** Establish the control channel used to run tests. */
  connect(handle: PlatformHandle, ctx: PlatformCallContext): Promise<ControlChannel>;

  /** Release everything held under the handle. */
  delete(handle: PlatformHandle, ctx: PlatformCallContext): Promise<void>;
}

// =============================================================================
// Templates & Handles
// =============================================================================

export interface Template {
  /** Unique within the owning adapter */
  name: string;
  capability: Capability;
  /** Adapter-specific provisioning parameters (image, target host, ...) */
  spec: Record<string, unknown>;
}

export interface PlatformHandle {
  platform: PlatformName;
  /** Adapter-assigned resource id (container name, VM id, target name) */
  id: string;
  template: string;
  createdAt: number;
  metadata?: Record<string, unknown>;
}

export interface PlatformCallContext {
  environmentId: EnvironmentId;
  /** Aborted on run cancellation or when the per-call timeout fires */
  signal: AbortSignal;
  /** 1-based attempt number for this verb */
  attempt: number;
}

// =============================================================================
// Control Channel
// =============================================================================

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface ExecuteOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  env?: Record<string, string>;
  cwd?: string;
}

export interface ControlChannel {
  /** Display name of the connected target (host:port, container name) */
  readonly target: string;
  execute(command: string, options?: ExecuteOptions): Promise<CommandResult>;
  close(): Promise<void>;
}

// =============================================================================
// Lifecycle Hooks
// =============================================================================

export interface PlatformLifecycleHooks {
  /** Called on registration; a rejection fails the registration. */
  onStartup?(): Promise<void>;
  /** Called on unregister and on scheduler shutdown. */
  onShutdown?(): Promise<void>;
}
