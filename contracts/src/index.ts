// index.ts - Re-exports from all modules

// Types & primitives
export type {
  TimestampMs,
  DurationMs,
  EnvironmentId,
  TestCaseId,
  PlatformName,
  EnvironmentState,
  TestStatus,
  TestProgress,
  OutcomeReason,
  TeardownStatus,
} from './types';

export {
  formatEnvironmentId,
  parseEnvironmentId,
  ENVIRONMENT_STATES,
  isTerminalState,
  isResourceHoldingState,
} from './types';

// Errors
export type { ErrorCategory } from './errors';

export {
  TestyardError,
  PlatformError,
  ValidationError,
  ConflictError,
  TimeoutError,
  CancelledError,
  SchedulerFatalError,
  errorMessage,
} from './errors';

// Timing
export type { TimingConfig, TimingKey } from './config/timing';

export {
  TIMING,
  parseDuration,
  getPlatformTiming,
  validateTimingConstraints,
  MAX_TIMER_DELAY_MS,
  calculateBackoff,
  formatDuration,
} from './config/timing';
