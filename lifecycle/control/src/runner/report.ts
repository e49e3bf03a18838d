// runner/report.ts - Run report and console notifier

import {
  formatDuration,
  type EnvironmentId,
  type EnvironmentState,
  type OutcomeReason,
  type PlatformName,
  type TeardownStatus,
  type TestCaseId,
  type TestStatus,
} from "@testyard/contracts";
import type { SchedulerEvents } from "./events";

// =============================================================================
// Types
// =============================================================================

export interface TestOutcome {
  testId: TestCaseId;
  status: TestStatus;
  reason?: OutcomeReason;
  message?: string;
  environmentId?: EnvironmentId;
  platform?: PlatformName;
  startedAt?: number;
  finishedAt?: number;
}

export interface EnvironmentReport {
  id: EnvironmentId;
  platform: PlatformName;
  template: string;
  state: EnvironmentState;
  capability: string;
  failureCode?: string;
  failureMessage?: string;
  teardown: TeardownStatus | "pending";
  tests: TestCaseId[];
}

export interface RunSummary {
  total: number;
  Completed: number;
  Failed: number;
  Skipped: number;
  Cancelled: number;
}

export interface RunReport {
  startedAt: number;
  finishedAt: number;
  cancelled: boolean;
  cancelReason?: string;
  deadlineExceeded: boolean;
  /** In submission order */
  tests: TestOutcome[];
  /** In creation order */
  environments: EnvironmentReport[];
  summary: RunSummary;
}

// =============================================================================
// Summaries
// =============================================================================

export function summarizeOutcomes(outcomes: readonly TestOutcome[]): RunSummary {
  const summary: RunSummary = { total: outcomes.length, Completed: 0, Failed: 0, Skipped: 0, Cancelled: 0 };
  for (const outcome of outcomes) {
    summary[outcome.status]++;
  }
  return summary;
}

export function formatOutcomeLine(outcome: TestOutcome): string {
  const where = outcome.environmentId ? ` [${outcome.environmentId}]` : "";
  const duration =
    outcome.startedAt !== undefined && outcome.finishedAt !== undefined
      ? ` (${formatDuration(outcome.finishedAt - outcome.startedAt)})`
      : "";
  const reason = outcome.reason ? ` ${outcome.reason}` : "";
  const message = outcome.message ? `: ${outcome.message}` : "";
  return `${outcome.status.toUpperCase()} ${outcome.testId}${where}${duration}${reason}${message}`;
}

export function formatRunSummary(report: RunReport): string {
  const { summary } = report;
  const leaked = report.environments.filter((e) => e.teardown === "failed").length;
  const lines = [
    `Run finished in ${formatDuration(report.finishedAt - report.startedAt)}${report.cancelled ? ` (cancelled: ${report.cancelReason ?? "no reason"})` : ""}`,
    `Tests: ${summary.total} total, ${summary.Completed} completed, ${summary.Failed} failed, ${summary.Skipped} skipped, ${summary.Cancelled} cancelled`,
    `Environments: ${report.environments.length} created, ${leaked} teardown failure(s)`,
  ];
  return lines.join("\n");
}

// =============================================================================
// Console Notifier
// =============================================================================

/** Print one line per finished test and a summary at the end. Returns a detach function. */
export function attachConsoleNotifier(
  events: SchedulerEvents,
  write: (line: string) => void = (line) => console.log(line)
): () => void {
  const onTest = ({ outcome }: { outcome: TestOutcome }) => write(formatOutcomeLine(outcome));
  const onRun = ({ report }: { report: RunReport }) => write(formatRunSummary(report));
  events.on("test_completed", onTest);
  events.on("test_skipped", onTest);
  events.on("run_completed", onRun);
  return () => {
    events.off("test_completed", onTest);
    events.off("test_skipped", onTest);
    events.off("run_completed", onRun);
  };
}
