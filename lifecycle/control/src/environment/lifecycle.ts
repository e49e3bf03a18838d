// environment/lifecycle.ts - Environment Lifecycle Manager
//
// Drives one environment through
//   New -> Preparing -> Prepared -> Deploying -> Deployed -> Connecting -> Connected
// then Connected <-> Executing per test, then TearingDown -> Deleted.
// Failures tear down whatever was acquired and end in Failed.
//
// Cancellation is cooperative: it is observed between adapter calls and during
// retry backoff, never mid-call. The hard signal (run deadline, scheduler
// fatal) abandons in-flight calls. Teardown ignores both.
//
// An abandoned prepare or connect keeps running. Whatever it produces later
// is released: late handles are deleted once teardown has begun, late
// channels are closed. pendingTeardown covers that work too.

import {
  CancelledError,
  ConflictError,
  PlatformError,
  TimeoutError,
  errorMessage,
  type EnvironmentId,
  type EnvironmentState,
  type TeardownStatus,
} from "@testyard/contracts";
import { refineCapability, type Capability } from "../capability/model";
import { PlatformOperationError, mapPlatformOperationError } from "../platform/errors";
import type {
  ControlChannel,
  PlatformAdapter,
  PlatformCallContext,
  PlatformHandle,
  PlatformName,
  Template,
} from "../platform/types";
import { linkedController, raceWithLimits, sleep as defaultSleep, type SleepFunction } from "./helpers";
import { determineRetryStrategy, type RetryPolicy } from "./retry";
import { requireTransition } from "./state-transitions";

// =============================================================================
// Types
// =============================================================================

export type ProvisioningFailureCode = "PROVISIONING_FAILED" | "DEPLOYMENT_FAILED" | "CONNECTION_FAILED";

export interface EnvironmentFailure {
  code: ProvisioningFailureCode | "TEARDOWN_FAILED";
  message: string;
}

export interface Environment {
  readonly id: EnvironmentId;
  readonly platform: PlatformName;
  readonly template: string;
  state: EnvironmentState;
  /** Template capability until deploy reports the measured one */
  capability: Capability;
  handle?: PlatformHandle;
  failure?: EnvironmentFailure;
  teardown: TeardownStatus | "pending";
  readonly createdAt: number;
}

export type ProvisionResult =
  | { kind: "connected"; channel: ControlChannel }
  | { kind: "failed"; code: ProvisioningFailureCode; error: PlatformError }
  | { kind: "cancelled" };

export type TransitionListener = (env: Environment, from: EnvironmentState, to: EnvironmentState) => void;

export interface LifecycleOptions {
  retry: RetryPolicy;
  callTimeoutMs: number;
  teardownRetry: { attempts: number; delayMs: number };
  /** Cooperative stop: observed between adapter calls */
  cancelSignal: AbortSignal;
  /** Hard stop: abandons in-flight adapter calls */
  hardSignal: AbortSignal;
  onTransition?: TransitionListener;
  sleep?: SleepFunction;
}

type Verb = "prepare" | "deploy" | "connect" | "delete";

const FAILURE_CODE: Record<Exclude<Verb, "delete">, ProvisioningFailureCode> = {
  prepare: "PROVISIONING_FAILED",
  deploy: "DEPLOYMENT_FAILED",
  connect: "CONNECTION_FAILED",
};

// =============================================================================
// Lifecycle
// =============================================================================

export class EnvironmentLifecycle {
  readonly environment: Environment;
  private channel?: ControlChannel;
  private readonly background = new Set<Promise<void>>();
  /** Handles that arrived after their prepare call was abandoned */
  private readonly strays: PlatformHandle[] = [];
  private teardownStarted = false;
  private readonly sleep: SleepFunction;

  constructor(
    id: EnvironmentId,
    private readonly adapter: PlatformAdapter,
    private readonly template: Template,
    private readonly options: LifecycleOptions
  ) {
    this.environment = {
      id,
      platform: adapter.name,
      template: template.name,
      state: "New",
      capability: template.capability,
      teardown: "pending",
      createdAt: Date.now(),
    };
    this.sleep = options.sleep ?? defaultSleep;
  }

  get state(): EnvironmentState {
    return this.environment.state;
  }

  /**
   * Settles when background work finishes: teardown retries and the release
   * of late results from abandoned calls. Undefined when nothing is pending.
   */
  get pendingTeardown(): Promise<void> | undefined {
    if (this.background.size === 0) return undefined;
    return this.drainBackground();
  }

  private async drainBackground(): Promise<void> {
    while (this.background.size > 0) {
      await Promise.all(this.background);
    }
  }

  get controlChannel(): ControlChannel | undefined {
    return this.channel;
  }

  // ---------------------------------------------------------------------------
  // Provisioning
  // ---------------------------------------------------------------------------

  async provision(): Promise<ProvisionResult> {
    this.move("Preparing");
    try {
      const handle = await this.step(
        "prepare",
        (ctx) => this.adapter.prepare(this.template, ctx),
        (late) => this.releaseLateHandle(late)
      );
      this.environment.handle = handle;
      this.move("Prepared");

      this.throwIfCancelled();
      this.move("Deploying");
      const measured = await this.step("deploy", (ctx) => this.adapter.deploy(handle, ctx));
      this.environment.capability = refineCapability(this.template.capability, measured);
      this.move("Deployed");

      this.throwIfCancelled();
      this.move("Connecting");
      const channel = await this.step(
        "connect",
        (ctx) => this.adapter.connect(handle, ctx),
        (late) => this.closeLateChannel(late)
      );
      this.channel = channel;
      this.move("Connected");

      this.throwIfCancelled();
      return { kind: "connected", channel };
    } catch (error) {
      if (error instanceof CancelledError) {
        console.log(`[lifecycle] ${this.environment.id} provisioning stopped: ${error.message}`);
        await this.teardown();
        return { kind: "cancelled" };
      }
      if (error instanceof PlatformError && isProvisioningFailureCode(error.code)) {
        this.environment.failure = { code: error.code, message: error.message };
        console.error(`[lifecycle] ${this.environment.id} ${error.message}`);
        await this.teardown();
        return { kind: "failed", code: error.code, error };
      }
      throw error;
    }
  }

  // ---------------------------------------------------------------------------
  // Test execution edges
  // ---------------------------------------------------------------------------

  beginTest(): ControlChannel {
    if (!this.channel) {
      throw new ConflictError(`Environment ${this.environment.id} has no control channel`, {
        details: { environmentId: this.environment.id, state: this.environment.state },
      });
    }
    this.move("Executing");
    return this.channel;
  }

  endTest(): void {
    this.move("Connected");
  }

  // ---------------------------------------------------------------------------
  // Teardown
  // ---------------------------------------------------------------------------

  /** Drop an environment that never left New. */
  discard(): void {
    this.teardownStarted = true;
    this.move("Deleted");
    this.environment.teardown = "not_required";
  }

  /**
   * Release everything held by the environment. Idempotent. Resolves after
   * the first delete attempt; further attempts continue in the background.
   */
  async teardown(): Promise<void> {
    const env = this.environment;
    if (env.state === "Deleted" || env.state === "Failed" || env.state === "TearingDown") return;
    if (env.state === "New") {
      this.discard();
      return;
    }

    this.teardownStarted = true;
    this.move("TearingDown");
    await this.closeChannel();

    const handle = env.handle;
    this.reclaimStrays(handle);
    if (!handle) {
      env.teardown = "not_required";
      this.finishTeardown();
      return;
    }

    try {
      await this.deleteOnce(handle, 1);
      env.teardown = "deleted";
      this.finishTeardown();
    } catch (error) {
      env.teardown = "failed";
      env.failure ??= { code: "TEARDOWN_FAILED", message: `delete failed: ${errorMessage(error)}` };
      console.error(`[lifecycle] ${env.id} teardown failed on ${env.platform}/${handle.id}`, {
        error: errorMessage(error),
      });
      this.move("Failed");
      if (this.options.teardownRetry.attempts > 1) {
        this.track(this.retryTeardown(handle));
      }
    }
  }

  private finishTeardown(): void {
    this.move(this.environment.failure ? "Failed" : "Deleted");
  }

  private async retryTeardown(handle: PlatformHandle): Promise<void> {
    if (await this.deleteWithRetries(handle, 2)) {
      this.environment.teardown = "deleted";
    }
  }

  /** Delete attempts firstAttempt..teardownRetry.attempts. Resolves true once one succeeds. */
  private async deleteWithRetries(handle: PlatformHandle, firstAttempt: number): Promise<boolean> {
    const env = this.environment;
    const { attempts, delayMs } = this.options.teardownRetry;
    for (let attempt = firstAttempt; attempt <= attempts; attempt++) {
      if (attempt > 1) await this.sleep(delayMs);
      try {
        await this.deleteOnce(handle, attempt);
        console.log(`[lifecycle] ${env.id} deleted ${env.platform}/${handle.id} on attempt ${attempt}`);
        return true;
      } catch (error) {
        console.warn(`[lifecycle] ${env.id} delete attempt ${attempt} of ${handle.id} failed`, {
          error: errorMessage(error),
        });
      }
    }
    console.error(`[lifecycle] ${env.id} teardown abandoned; ${env.platform}/${handle.id} may be leaked`);
    return false;
  }

  private async releaseLateHandle(handle: PlatformHandle): Promise<void> {
    if (!this.teardownStarted) {
      this.strays.push(handle);
      return;
    }
    if (handle.id === this.environment.handle?.id) return;
    await this.deleteWithRetries(handle, 1);
  }

  private reclaimStrays(current: PlatformHandle | undefined): void {
    for (const stray of this.strays.splice(0)) {
      if (stray.id === current?.id) continue;
      this.track(this.deleteWithRetries(stray, 1).then(() => undefined));
    }
  }

  private async closeLateChannel(channel: ControlChannel): Promise<void> {
    try {
      await channel.close();
    } catch (error) {
      console.warn(`[lifecycle] ${this.environment.id} late channel close failed`, { error: errorMessage(error) });
    }
  }

  /** Keep background work visible through pendingTeardown until it settles. */
  private track(work: Promise<void>): void {
    const settled: Promise<void> = work.then(
      () => {
        this.background.delete(settled);
      },
      (error: unknown) => {
        this.background.delete(settled);
        console.error(`[lifecycle] ${this.environment.id} background work failed`, { error: errorMessage(error) });
      }
    );
    this.background.add(settled);
  }

  private async deleteOnce(handle: PlatformHandle, attempt: number): Promise<void> {
    await this.call("delete", attempt, (ctx) => this.adapter.delete(handle, ctx), { interruptible: false });
  }

  private async closeChannel(): Promise<void> {
    const channel = this.channel;
    this.channel = undefined;
    if (!channel) return;
    try {
      await channel.close();
    } catch (error) {
      console.warn(`[lifecycle] ${this.environment.id} channel close failed`, { error: errorMessage(error) });
    }
  }

  // ---------------------------------------------------------------------------
  // Adapter calls
  // ---------------------------------------------------------------------------

  private async step<T>(
    verb: Exclude<Verb, "delete">,
    fn: (ctx: PlatformCallContext) => Promise<T>,
    release?: (late: T) => Promise<void> | void
  ): Promise<T> {
    const platform = this.adapter.name;
    for (let attempt = 1; ; attempt++) {
      this.throwIfCancelled();
      try {
        return await this.call(verb, attempt, fn, { interruptible: true, release });
      } catch (error) {
        if (error instanceof CancelledError) throw error;
        this.throwIfCancelled();

        const mapped = mapPlatformOperationError(platform, error);
        const decision = determineRetryStrategy(mapped, attempt, this.options.retry);
        if (!decision.shouldRetry) {
          throw new PlatformError(
            platform,
            `${verb} failed after ${attempt} attempt(s): ${mapped.message}`,
            {
              code: FAILURE_CODE[verb],
              cause: mapped,
              details: { verb, attempt, errorCode: mapped.code, environmentId: this.environment.id },
            }
          );
        }

        console.warn(
          `[lifecycle] ${this.environment.id} ${verb} attempt ${attempt}/${decision.maxAttempts} failed (${mapped.code}), retrying in ${decision.delayMs}ms`
        );
        await this.sleep(decision.delayMs, this.options.cancelSignal);
      }
    }
  }

  private async call<T>(
    verb: Verb,
    attempt: number,
    fn: (ctx: PlatformCallContext) => Promise<T>,
    options: { interruptible: boolean; release?: (late: T) => Promise<void> | void }
  ): Promise<T> {
    const { interruptible, release } = options;
    const parents = interruptible ? [this.options.hardSignal] : [];
    const { controller, dispose } = linkedController(...parents);
    const ctx: PlatformCallContext = { environmentId: this.environment.id, signal: controller.signal, attempt };
    const what = `${this.adapter.name}.${verb}`;
    let finished = false;
    const work = (async () => {
      try {
        return await fn(ctx);
      } finally {
        finished = true;
      }
    })();
    try {
      return await raceWithLimits(work, {
        timeoutMs: this.options.callTimeoutMs,
        signal: interruptible ? this.options.hardSignal : undefined,
        what,
      });
    } catch (error) {
      if (!finished && release) {
        this.track(this.releaseAbandoned(verb, work, release));
      }
      if (error instanceof TimeoutError) {
        controller.abort(error);
        throw new PlatformOperationError(this.adapter.name, "TIMEOUT_ERROR", error.message, {
          retryable: true,
          details: { verb, attempt },
        });
      }
      throw error;
    } finally {
      dispose();
    }
  }

  private async releaseAbandoned<T>(
    verb: Verb,
    work: Promise<T>,
    release: (late: T) => Promise<void> | void
  ): Promise<void> {
    let late: T;
    try {
      late = await work;
    } catch (error) {
      console.warn(`[lifecycle] ${this.environment.id} abandoned ${verb} failed late`, { error: errorMessage(error) });
      return;
    }
    console.warn(`[lifecycle] ${this.environment.id} abandoned ${verb} completed late; releasing its result`);
    await release(late);
  }

  // ---------------------------------------------------------------------------
  // State
  // ---------------------------------------------------------------------------

  private throwIfCancelled(): void {
    if (this.options.hardSignal.aborted) {
      throw new CancelledError(reasonText(this.options.hardSignal, "Run deadline exceeded"));
    }
    if (this.options.cancelSignal.aborted) {
      throw new CancelledError(reasonText(this.options.cancelSignal, "Run cancelled"));
    }
  }

  private move(to: EnvironmentState): void {
    const from = requireTransition(this.environment, to);
    this.options.onTransition?.(this.environment, from, to);
  }
}

// =============================================================================
// Helpers
// =============================================================================

function isProvisioningFailureCode(code: string): code is ProvisioningFailureCode {
  return code === "PROVISIONING_FAILED" || code === "DEPLOYMENT_FAILED" || code === "CONNECTION_FAILED";
}

function reasonText(signal: AbortSignal, fallback: string): string {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) return reason.message;
  if (typeof reason === "string") return reason;
  return fallback;
}
