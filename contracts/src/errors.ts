// errors.ts - Error Types and Factory Functions

// =============================================================================
// CATEGORIES
// =============================================================================

export type ErrorCategory =
  | 'validation'
  | 'auth'
  | 'not_found'
  | 'conflict'
  | 'rate_limit'
  | 'platform'
  | 'capability'
  | 'timeout'
  | 'cancelled'
  | 'internal';

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/** Base error class for all testyard errors */
export class TestyardError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly details?: Record<string, unknown>;
  readonly retry_after_ms?: number;

  constructor(
    code: string,
    message: string,
    category: ErrorCategory,
    options?: {
      details?: Record<string, unknown>;
      retry_after_ms?: number;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'TestyardError';
    this.code = code;
    this.category = category;
    this.details = options?.details;
    this.retry_after_ms = options?.retry_after_ms;
  }
}

/** Platform adapter call failure, after mapping and retries */
export class PlatformError extends TestyardError {
  readonly platform: string;

  constructor(
    platform: string,
    message: string,
    options?: {
      code?: string;
      details?: Record<string, unknown>;
      retry_after_ms?: number;
      cause?: unknown;
    },
  ) {
    super(options?.code ?? 'PLATFORM_INTERNAL', message, 'platform', options);
    this.name = 'PlatformError';
    this.platform = platform;
  }
}

/** Validation error (bad declaration or configuration) */
export class ValidationError extends TestyardError {
  constructor(
    message: string,
    options?: {
      code?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(options?.code ?? 'INVALID_INPUT', message, 'validation', options);
    this.name = 'ValidationError';
  }
}

/** State conflict error (invalid state transition, reuse of a terminal environment) */
export class ConflictError extends TestyardError {
  constructor(
    message: string,
    options?: {
      code?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(
      options?.code ?? 'INVALID_STATE_TRANSITION',
      message,
      'conflict',
      options,
    );
    this.name = 'ConflictError';
  }
}

/** Timeout error */
export class TimeoutError extends TestyardError {
  constructor(
    message: string,
    options?: {
      code?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(
      options?.code ?? 'OPERATION_TIMEOUT',
      message,
      'timeout',
      options,
    );
    this.name = 'TimeoutError';
  }
}

/** Cooperative cancellation observed at a suspension point */
export class CancelledError extends TestyardError {
  constructor(message = 'Operation cancelled', options?: { cause?: unknown }) {
    super('CANCELLED', message, 'cancelled', options);
    this.name = 'CancelledError';
  }
}

/**
 * Internal invariant violation. Aborts the run after best-effort teardown
 * of every live environment.
 */
export class SchedulerFatalError extends TestyardError {
  constructor(
    message: string,
    options?: {
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super('SCHEDULER_FATAL', message, 'internal', options);
    this.name = 'SchedulerFatalError';
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/** Render any thrown value as a one-line message */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
