// runner/scheduler.ts - Scheduler / Runner
//
// Owns the run: builds the execution plan, asks the matcher for a placement per
// partition, starts environment lifecycles through a bounded pool, serializes
// tests per environment and collects outcomes. Lifecycles run concurrently;
// all scheduler bookkeeping happens on the event loop between awaits, so no
// state here needs locking.

import {
  CancelledError,
  ConflictError,
  SchedulerFatalError,
  TIMING,
  TimeoutError,
  ValidationError,
  errorMessage,
  formatEnvironmentId,
  isResourceHoldingState,
  type EnvironmentState,
  type OutcomeReason,
  type TestCaseId,
  type TestProgress,
  type TestStatus,
} from "@testyard/contracts";
import {
  describeCapability,
  satisfies,
  unsatisfiedDimensions,
  type Requirement,
} from "../capability/model";
import {
  describeRejections,
  matchRequirement,
  weightedSlack,
  type MatchCandidate,
  type SlackMetric,
} from "../capability/matcher";
import { resolveRunConfig, type RunConfig, type RunConfigInput } from "../config";
import {
  abortPromise,
  createTimeout,
  linkedController,
  sleep as defaultSleep,
  type SleepFunction,
} from "../environment/helpers";
import { EnvironmentLifecycle, type Environment } from "../environment/lifecycle";
import { PlatformRegistry, type RegisteredTemplate } from "../platform/registry";
import type { PlatformAdapter, PlatformLifecycleHooks } from "../platform/types";
import { SchedulerEvents } from "./events";
import { partitionTests, type Partition } from "./partition";
import { summarizeOutcomes, type EnvironmentReport, type RunReport, type TestOutcome } from "./report";
import type { TestCase, TestContext, TestSource } from "./test-registry";

// =============================================================================
// Types
// =============================================================================

export interface SchedulerOptions {
  config?: RunConfigInput;
  /** Overrides the weighted slack metric built from config.slackWeights */
  slackMetric?: SlackMetric;
  /** For tests: replaces backoff and grace-period waits */
  sleep?: SleepFunction;
}

export interface RunOptions {
  /** Aborting this signal cancels the run */
  signal?: AbortSignal;
}

interface TestRecord {
  test: TestCase;
  seq: number;
  priority: number;
  requirement: Requirement;
  progress: TestProgress;
  environment?: EnvironmentEntry;
  startedAt?: number;
  outcome?: TestOutcome;
}

interface EnvironmentEntry {
  lifecycle: EnvironmentLifecycle;
  /** Assigned, not yet started, in execution order */
  queue: TestRecord[];
  /** Every test ever assigned */
  assigned: TestRecord[];
  /** No further assignments accepted */
  released: boolean;
}

type Placement = { kind: "live"; entry: EnvironmentEntry } | { kind: "template"; registered: RegisteredTemplate };

interface ActiveRun {
  config: RunConfig;
  metric: SlackMetric;
  cancel: AbortController;
  hard: AbortController;
  startedAt: number;
  cancelReason?: string;
  deadlineExceeded: boolean;
}

const LIVE_STATES: ReadonlySet<EnvironmentState> = new Set(["Connected", "Executing"]);

// =============================================================================
// Scheduler
// =============================================================================

export class Scheduler {
  readonly events = new SchedulerEvents();
  readonly platforms = new PlatformRegistry();

  private status: "idle" | "running" | "finished" = "idle";
  private active?: ActiveRun;
  private readonly sleep: SleepFunction;

  private readonly tests: TestRecord[] = [];
  private readonly testIds = new Set<TestCaseId>();
  private readonly environments: EnvironmentEntry[] = [];
  private readonly startQueue: EnvironmentEntry[] = [];
  private readonly tasks = new Set<Promise<void>>();
  private activeSlots = 0;
  private envSeq = 0;
  private testSeq = 0;
  private fatal?: unknown;

  constructor(private readonly options: SchedulerOptions = {}) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  async registerPlatform(adapter: PlatformAdapter, hooks?: PlatformLifecycleHooks): Promise<void> {
    await this.platforms.register({ adapter, hooks });
  }

  /** Run every onShutdown hook. */
  async shutdown(): Promise<void> {
    await this.platforms.shutdown();
  }

  /** Environments currently holding platform resources. */
  get activeEnvironments(): number {
    return this.environments.filter((e) => isResourceHoldingState(e.lifecycle.state)).length;
  }

  // ---------------------------------------------------------------------------
  // Run
  // ---------------------------------------------------------------------------

  /**
   * Execute `source` and resolve with the report once every test has a final
   * status and every environment is terminal. Rejects only with
   * SchedulerFatalError (after best-effort teardown) or on bad configuration.
   */
  async run(source: TestSource, options: RunOptions = {}): Promise<RunReport> {
    if (this.status !== "idle") {
      throw new ConflictError("Scheduler has already run", { code: "RUN_ALREADY_STARTED" });
    }
    const initial = [...source];
    this.assertNewTestIds(initial);

    const names = this.platforms.names();
    const config = resolveRunConfig(this.options.config, names.length === 1 ? names[0] : undefined);
    const run: ActiveRun = {
      config,
      metric: this.options.slackMetric ?? weightedSlack(config.slackWeights),
      cancel: new AbortController(),
      hard: new AbortController(),
      startedAt: Date.now(),
      deadlineExceeded: false,
    };
    this.active = run;
    this.status = "running";

    const onExternalAbort = () => this.cancel("Run cancelled by caller");
    options.signal?.addEventListener("abort", onExternalAbort, { once: true });
    const deadline = setTimeout(() => this.expireDeadline(run), config.runDeadlineMs);

    console.log(
      `[scheduler] Run started: ${names.length} platform(s), concurrency ${config.concurrency}, capacity ${config.environmentCapacity}`
    );

    try {
      if (options.signal?.aborted) this.cancel("Run cancelled by caller");
      this.submit(initial);
      await this.drain();
    } catch (error) {
      this.recordFatal(error);
    } finally {
      clearTimeout(deadline);
      options.signal?.removeEventListener("abort", onExternalAbort);
    }

    if (this.fatal !== undefined) {
      await this.settleAll();
      this.status = "finished";
      const cause = this.fatal;
      console.error("[scheduler] Run aborted by internal error", { error: errorMessage(cause) });
      if (cause instanceof SchedulerFatalError) throw cause;
      throw new SchedulerFatalError(`Scheduler invariant violated: ${errorMessage(cause)}`, { cause });
    }

    await this.awaitBackgroundTeardowns(run.config.teardownGraceMs);
    const report = this.buildReport(run);
    this.status = "finished";
    console.log(
      `[scheduler] Run finished: ${report.summary.Completed} completed, ${report.summary.Failed} failed, ${report.summary.Skipped} skipped, ${report.summary.Cancelled} cancelled`
    );
    this.events.emit("run_completed", { report, timestamp: Date.now() });
    return report;
  }

  /**
   * Add work to a running plan. New tests go through a fresh placement pass,
   * where live environments with spare capacity are preferred.
   */
  submit(source: TestSource): void {
    const run = this.requireRunning();
    const batch = [...source];
    this.assertNewTestIds(batch);
    const records: TestRecord[] = [];
    for (const test of batch) {
      this.testIds.add(test.id);
      const record: TestRecord = {
        test,
        seq: this.testSeq++,
        priority: test.metadata.priority,
        requirement: test.requirement,
        progress: "Pending",
      };
      this.tests.push(record);
      records.push(record);
    }

    if (this.isStopping(run)) {
      for (const record of records) this.finish(record, "Cancelled", "CANCELLED", run.cancelReason);
      return;
    }

    this.placementPass(run, records);
    this.pump(run);
  }

  /** A batch is accepted whole or not at all. */
  private assertNewTestIds(batch: TestCase[]): void {
    const seen = new Set<TestCaseId>();
    for (const test of batch) {
      if (seen.has(test.id) || this.testIds.has(test.id)) {
        throw new ValidationError(`Test case '${test.id}' submitted twice`, { code: "DUPLICATE_TEST_CASE" });
      }
      seen.add(test.id);
    }
  }

  /** Cooperative cancellation: no new environments, running tests are signalled. */
  cancel(reason = "Run cancelled"): void {
    const run = this.active;
    if (!run || this.status !== "running" || run.cancel.signal.aborted) return;
    run.cancelReason = reason;
    console.log(`[scheduler] Cancelling run: ${reason}`);
    run.cancel.abort(new CancelledError(reason));
    this.discardQueued(run);
  }

  // ---------------------------------------------------------------------------
  // Placement
  // ---------------------------------------------------------------------------

  private placementPass(run: ActiveRun, records: TestRecord[]): void {
    if (records.length === 0) return;
    const templates = this.platforms.templates();
    const partitions = partitionTests(records, {
      capacity: run.config.environmentCapacity,
      templates: templates.map((t) => t.template.capability),
    });
    console.log(`[scheduler] Placing ${records.length} test(s) in ${partitions.length} partition(s)`);
    for (const partition of partitions) {
      this.placePartition(run, partition, templates);
    }
  }

  private placePartition(run: ActiveRun, partition: Partition<TestRecord>, templates: RegisteredTemplate[]): void {
    const capacity = run.config.environmentCapacity;
    let remaining = partition.tests;

    while (remaining.length > 0) {
      const result = matchRequirement(partition.requirement, this.candidatePool(run, templates), run.metric);
      if (result.kind === "no_candidate") {
        const message = `no environment satisfies the requirement (${describeRejections(result.rejections)})`;
        for (const record of remaining) this.finish(record, "Skipped", "CAPABILITY_MISMATCH", message);
        return;
      }

      const placement = result.selected.candidate.item;
      const entry = placement.kind === "live" ? placement.entry : this.createEnvironment(run, placement.registered);
      const room = capacity - entry.assigned.length;
      const batch = remaining.slice(0, room);
      remaining = remaining.slice(room);
      for (const record of batch) {
        record.progress = "Assigned";
        record.environment = entry;
        entry.queue.push(record);
        entry.assigned.push(record);
      }
    }
  }

  private candidatePool(run: ActiveRun, templates: RegisteredTemplate[]): MatchCandidate<Placement>[] {
    const pool: MatchCandidate<Placement>[] = [];
    for (const entry of this.environments) {
      const env = entry.lifecycle.environment;
      if (entry.released || !LIVE_STATES.has(env.state)) continue;
      if (entry.assigned.length >= run.config.environmentCapacity) continue;
      pool.push({ kind: "live", label: env.id, capability: env.capability, item: { kind: "live", entry } });
    }
    for (const registered of templates) {
      pool.push({
        kind: "provisionable",
        label: `${registered.adapter.name}/${registered.template.name}`,
        capability: registered.template.capability,
        item: { kind: "template", registered },
      });
    }
    return pool;
  }

  private createEnvironment(run: ActiveRun, registered: RegisteredTemplate): EnvironmentEntry {
    const lifecycle = new EnvironmentLifecycle(
      formatEnvironmentId(++this.envSeq),
      registered.adapter,
      registered.template,
      {
        retry: {
          maxAttempts: run.config.retryAttempts,
          baseDelayMs: run.config.retryBaseDelayMs,
          maxDelayMs: run.config.retryMaxDelayMs,
        },
        callTimeoutMs: run.config.adapterCallTimeoutMs,
        teardownRetry: { attempts: run.config.teardownRetryAttempts, delayMs: run.config.teardownRetryDelayMs },
        cancelSignal: run.cancel.signal,
        hardSignal: run.hard.signal,
        onTransition: (env, from, to) => this.onTransition(env, from, to),
        sleep: this.sleep,
      }
    );
    const entry: EnvironmentEntry = { lifecycle, queue: [], assigned: [], released: false };
    this.environments.push(entry);
    this.startQueue.push(entry);
    return entry;
  }

  // ---------------------------------------------------------------------------
  // Pool
  // ---------------------------------------------------------------------------

  private pump(run: ActiveRun): void {
    while (!this.isStopping(run) && this.activeSlots < run.config.concurrency) {
      const entry = this.startQueue.shift();
      if (!entry) return;
      this.acquireSlot(run);
      const task: Promise<void> = this.driveEnvironment(run, entry).finally(() => {
        this.tasks.delete(task);
        this.releaseSlot();
        this.pump(run);
      });
      this.tasks.add(task);
    }
  }

  private acquireSlot(run: ActiveRun): void {
    if (this.activeSlots >= run.config.concurrency) {
      throw new SchedulerFatalError(`Slot counter ${this.activeSlots} at concurrency bound on acquire`);
    }
    this.activeSlots++;
  }

  private releaseSlot(): void {
    if (this.activeSlots <= 0) {
      throw new SchedulerFatalError(`Slot counter ${this.activeSlots} on release`);
    }
    this.activeSlots--;
  }

  /** Wait until no lifecycle task is running and nothing waits for a slot. */
  private async drain(): Promise<void> {
    const run = this.requireRunning();
    while (this.tasks.size > 0 || this.startQueue.length > 0) {
      if (this.fatal !== undefined) return;
      if (this.tasks.size === 0) {
        if (this.isStopping(run)) {
          this.discardQueued(run);
        } else {
          this.pump(run);
          if (this.tasks.size === 0) {
            this.recordFatal(
              new SchedulerFatalError(`${this.startQueue.length} environment(s) waiting with no lifecycle running`)
            );
          }
        }
        continue;
      }
      try {
        await Promise.race(this.tasks);
      } catch (error) {
        this.recordFatal(error);
      }
    }
  }

  private async settleAll(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.allSettled([...this.tasks]);
    }
    const run = this.active;
    if (run) this.discardQueued(run);
  }

  private discardQueued(run: ActiveRun): void {
    for (const entry of this.startQueue.splice(0)) {
      entry.released = true;
      entry.lifecycle.discard();
      for (const record of entry.queue.splice(0)) {
        this.finish(record, "Cancelled", "CANCELLED", run.cancelReason ?? "Run stopped");
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Environment driver
  // ---------------------------------------------------------------------------

  private async driveEnvironment(run: ActiveRun, entry: EnvironmentEntry): Promise<void> {
    const { lifecycle } = entry;
    try {
      const result = await lifecycle.provision();
      if (result.kind === "failed") {
        entry.released = true;
        for (const record of entry.queue.splice(0)) {
          this.finish(record, "Failed", result.code, result.error.message);
        }
        return;
      }
      if (result.kind === "cancelled") {
        this.cancelQueue(run, entry);
        return;
      }

      this.skipMismatched(entry);
      while (!this.isStopping(run)) {
        const next = entry.queue.shift();
        if (!next) break;
        const reusable = await this.executeTest(run, entry, next);
        if (!reusable) {
          this.moveQueue(run, entry);
          break;
        }
      }
      this.cancelQueue(run, entry);
      await lifecycle.teardown();
    } catch (error) {
      this.recordFatal(error);
      this.cancelQueue(run, entry);
      try {
        await lifecycle.teardown();
      } catch (teardownError) {
        console.error(`[scheduler] Emergency teardown of ${lifecycle.environment.id} failed`, {
          error: errorMessage(teardownError),
        });
      }
    }
  }

  private cancelQueue(run: ActiveRun, entry: EnvironmentEntry): void {
    entry.released = true;
    for (const record of entry.queue.splice(0)) {
      this.finish(record, "Cancelled", "CANCELLED", run.cancelReason ?? "Run stopped");
    }
  }

  /**
   * A timed-out test that keeps running still owns the channel. Tests queued
   * behind it go through placement again and land on another environment.
   */
  private moveQueue(run: ActiveRun, entry: EnvironmentEntry): void {
    entry.released = true;
    const moved = entry.queue.splice(0);
    if (moved.length === 0 || this.isStopping(run)) {
      for (const record of moved) this.finish(record, "Cancelled", "CANCELLED", run.cancelReason ?? "Run stopped");
      return;
    }
    console.warn(
      `[scheduler] ${entry.lifecycle.environment.id} still runs an abandoned test; moving ${moved.length} test(s) elsewhere`
    );
    entry.assigned = entry.assigned.filter((record) => !moved.includes(record));
    for (const record of moved) {
      record.progress = "Pending";
      record.environment = undefined;
    }
    this.placementPass(run, moved);
  }

  /** Deploy may refine the capability; drop tests it no longer satisfies. */
  private skipMismatched(entry: EnvironmentEntry): void {
    const env = entry.lifecycle.environment;
    const kept: TestRecord[] = [];
    for (const record of entry.queue) {
      if (satisfies(env.capability, record.requirement)) {
        kept.push(record);
        continue;
      }
      const dims = unsatisfiedDimensions(env.capability, record.requirement).join(", ");
      this.finish(record, "Skipped", "CAPABILITY_MISMATCH", `measured capability of ${env.id} does not satisfy: ${dims}`);
    }
    entry.queue = kept;
  }

  /** Resolves false when the test timed out and its body did not stop within the settle window. */
  private async executeTest(run: ActiveRun, entry: EnvironmentEntry, record: TestRecord): Promise<boolean> {
    const { lifecycle } = entry;
    const env = lifecycle.environment;
    const channel = lifecycle.beginTest();
    record.progress = "Running";
    record.startedAt = Date.now();
    this.events.emit("test_started", { testId: record.test.id, environmentId: env.id, timestamp: record.startedAt });

    const timeoutMs = record.test.timeoutMs ?? run.config.testTimeoutMs;
    const { controller, dispose } = linkedController(run.cancel.signal, run.hard.signal);
    const ctx: TestContext = {
      testId: record.test.id,
      environmentId: env.id,
      platform: env.platform,
      capability: env.capability,
      channel,
      signal: controller.signal,
    };
    const timeout = createTimeout(timeoutMs, `Test ${record.test.id}`);
    const hardStop = abortPromise(run.hard.signal);
    let reusable = true;

    const work = (async () => record.test.run(ctx))();

    try {
      await Promise.race([work, timeout.promise, hardStop.promise]);
      this.finish(record, "Completed");
    } catch (error) {
      if (timeout.fired()) {
        controller.abort(new TimeoutError(`Test ${record.test.id} timed out after ${timeoutMs}ms`));
        this.finish(record, "Failed", "TEST_TIMEOUT", `timed out after ${timeoutMs}ms`);
        reusable = await this.settlesWithin(work, TIMING.TEST_SETTLE_MS);
        if (!reusable) {
          console.warn(`[scheduler] ${env.id} test ${record.test.id} did not stop after its timeout`);
        }
      } else if (error instanceof CancelledError || controller.signal.aborted) {
        this.finish(record, "Cancelled", "CANCELLED", run.cancelReason ?? errorMessage(error));
      } else {
        this.finish(record, "Failed", "TEST_FAILED", errorMessage(error));
      }
    } finally {
      timeout.clear();
      hardStop.dispose();
      dispose();
    }

    lifecycle.endTest();
    return reusable;
  }

  private async settlesWithin(work: Promise<unknown>, ms: number): Promise<boolean> {
    const grace = new AbortController();
    const settled = await Promise.race([
      work.then(
        () => true,
        () => true
      ),
      this.sleep(ms, grace.signal).then(() => false),
    ]);
    grace.abort();
    return settled;
  }

  // ---------------------------------------------------------------------------
  // Outcomes & events
  // ---------------------------------------------------------------------------

  private finish(record: TestRecord, status: TestStatus, reason?: OutcomeReason, message?: string): void {
    if (record.outcome) return;
    const env = record.environment?.lifecycle.environment;
    const outcome: TestOutcome = { testId: record.test.id, status };
    if (reason) outcome.reason = reason;
    if (message) outcome.message = message;
    if (env) {
      outcome.environmentId = env.id;
      outcome.platform = env.platform;
    }
    if (record.startedAt !== undefined) {
      outcome.startedAt = record.startedAt;
      outcome.finishedAt = Date.now();
    }
    record.outcome = outcome;
    record.progress = status;

    if (status === "Skipped") {
      console.warn(`[scheduler] Skipped ${record.test.id}: ${message ?? reason ?? "no reason"}`);
      this.events.emit("test_skipped", { outcome, timestamp: Date.now() });
    } else {
      this.events.emit("test_completed", { outcome, timestamp: Date.now() });
    }
  }

  private onTransition(env: Environment, from: EnvironmentState, to: EnvironmentState): void {
    console.log(`[scheduler] ${env.id} ${from} -> ${to}`);
    this.events.emit("environment_state_changed", {
      environmentId: env.id,
      platform: env.platform,
      template: env.template,
      from,
      to,
      timestamp: Date.now(),
    });
  }

  // ---------------------------------------------------------------------------
  // Stop conditions
  // ---------------------------------------------------------------------------

  private expireDeadline(run: ActiveRun): void {
    run.deadlineExceeded = true;
    console.error(`[scheduler] Run deadline of ${run.config.runDeadlineMs}ms exceeded; forcing teardown`);
    this.cancel("Run deadline exceeded");
    run.hard.abort(new TimeoutError("Run deadline exceeded", { code: "RUN_DEADLINE_EXCEEDED" }));
  }

  private recordFatal(error: unknown): void {
    if (this.fatal === undefined) {
      this.fatal = error;
      console.error("[scheduler] Fatal error, tearing down all environments", { error: errorMessage(error) });
    }
    const run = this.active;
    if (!run) return;
    run.cancelReason ??= "Scheduler fatal error";
    run.cancel.abort(new CancelledError(run.cancelReason));
    run.hard.abort(new CancelledError(run.cancelReason));
  }

  private isStopping(run: ActiveRun): boolean {
    return run.cancel.signal.aborted || run.hard.signal.aborted;
  }

  private requireRunning(): ActiveRun {
    if (this.status !== "running" || !this.active) {
      throw new ConflictError("Scheduler is not running", { code: "INVALID_STATE_TRANSITION" });
    }
    return this.active;
  }

  // ---------------------------------------------------------------------------
  // Report
  // ---------------------------------------------------------------------------

  /** Background teardown retries get at most `graceMs` before the report is built. */
  private async awaitBackgroundTeardowns(graceMs: number): Promise<void> {
    const pending = this.environments.flatMap((e) => {
      const p = e.lifecycle.pendingTeardown;
      return p ? [p] : [];
    });
    if (pending.length === 0) return;
    const grace = new AbortController();
    await Promise.race([Promise.allSettled(pending), this.sleep(graceMs, grace.signal)]);
    grace.abort();
  }

  private buildReport(run: ActiveRun): RunReport {
    const tests = this.tests.map((record) => {
      if (!record.outcome) {
        this.finish(record, "Cancelled", "CANCELLED", "Run ended before the test was scheduled");
      }
      return record.outcome ?? { testId: record.test.id, status: "Cancelled" as const };
    });
    const environments: EnvironmentReport[] = this.environments.map(({ lifecycle, assigned }) => {
      const env = lifecycle.environment;
      const report: EnvironmentReport = {
        id: env.id,
        platform: env.platform,
        template: env.template,
        state: env.state,
        capability: describeCapability(env.capability),
        teardown: env.teardown,
        tests: assigned.map((r) => r.test.id),
      };
      if (env.failure) {
        report.failureCode = env.failure.code;
        report.failureMessage = env.failure.message;
      }
      return report;
    });

    const report: RunReport = {
      startedAt: run.startedAt,
      finishedAt: Date.now(),
      cancelled: run.cancel.signal.aborted,
      deadlineExceeded: run.deadlineExceeded,
      tests,
      environments,
      summary: summarizeOutcomes(tests),
    };
    if (run.cancelReason) report.cancelReason = run.cancelReason;
    return report;
  }
}
