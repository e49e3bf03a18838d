// runner/events.ts - Typed EventEmitter for scheduler events
//
// The scheduler emits; notifiers subscribe. Delivery is best-effort: a
// listener that throws or rejects is logged and never reaches the scheduler.

import { EventEmitter } from "events";
import type { EnvironmentId, EnvironmentState, PlatformName, TestCaseId } from "@testyard/contracts";
import type { RunReport, TestOutcome } from "./report";

// =============================================================================
// Event Payload Types
// =============================================================================

export interface EnvironmentStateChangedPayload {
  environmentId: EnvironmentId;
  platform: PlatformName;
  template: string;
  from: EnvironmentState;
  to: EnvironmentState;
  timestamp: number;
}

export interface TestStartedPayload {
  testId: TestCaseId;
  environmentId: EnvironmentId;
  timestamp: number;
}

export interface TestCompletedPayload {
  outcome: TestOutcome;
  timestamp: number;
}

export interface TestSkippedPayload {
  outcome: TestOutcome;
  timestamp: number;
}

export interface RunCompletedPayload {
  report: RunReport;
  timestamp: number;
}

// =============================================================================
// Event Map
// =============================================================================

export interface SchedulerEventMap {
  environment_state_changed: [EnvironmentStateChangedPayload];
  test_started: [TestStartedPayload];
  /** Completed, Failed and Cancelled outcomes */
  test_completed: [TestCompletedPayload];
  test_skipped: [TestSkippedPayload];
  run_completed: [RunCompletedPayload];
}

export type SchedulerListener<K extends keyof SchedulerEventMap> = (
  ...args: SchedulerEventMap[K]
) => void | Promise<void>;

// =============================================================================
// Typed Emitter
// =============================================================================

export class SchedulerEvents extends EventEmitter {
  constructor() {
    super();
    this.setMaxListeners(50);
  }

  /** Synchronous, isolated delivery. Returns true if any listener was called. */
  emit<K extends keyof SchedulerEventMap>(event: K, ...args: SchedulerEventMap[K]): boolean {
    const listeners = this.rawListeners(event);
    for (const listener of listeners) {
      try {
        const result: unknown = Reflect.apply(listener, this, args);
        if (result instanceof Promise) {
          result.catch((err: unknown) => logListenerError(event, err));
        }
      } catch (err) {
        logListenerError(event, err);
      }
    }
    return listeners.length > 0;
  }

  on<K extends keyof SchedulerEventMap>(event: K, listener: SchedulerListener<K>): this {
    return super.on(event, listener);
  }

  off<K extends keyof SchedulerEventMap>(event: K, listener: SchedulerListener<K>): this {
    return super.off(event, listener);
  }

  once<K extends keyof SchedulerEventMap>(event: K, listener: SchedulerListener<K>): this {
    return super.once(event, listener);
  }
}

function logListenerError(event: string, err: unknown): void {
  console.error(`[events] Listener for ${event} failed:`, err instanceof Error ? err.message : String(err));
}
