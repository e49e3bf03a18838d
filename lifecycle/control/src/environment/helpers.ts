// environment/helpers.ts - Sleep, timeout and signal helpers for lifecycle code

import { CancelledError, TimeoutError } from "@testyard/contracts";

// =============================================================================
// Sleep
// =============================================================================

export type SleepFunction = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Resolves after `ms`, or early (without error) when the signal aborts. */
export const sleep: SleepFunction = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timerId);
      resolve();
    };
    const timerId = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

// =============================================================================
// Timeout
// =============================================================================

export interface TimeoutHandle {
  promise: Promise<never>;
  clear: () => void;
  /** True once the timer has fired */
  fired: () => boolean;
}

export function createTimeout(ms: number, what = "Operation"): TimeoutHandle {
  let timerId: ReturnType<typeof setTimeout> | undefined;
  let didFire = false;
  const promise = new Promise<never>((_, reject) => {
    timerId = setTimeout(() => {
      didFire = true;
      reject(
        new TimeoutError(`${what} timed out after ${ms}ms`, {
          code: "TIMEOUT_ERROR",
          details: { timeoutMs: ms },
        })
      );
    }, ms);
  });
  return { promise, clear: () => clearTimeout(timerId), fired: () => didFire };
}

// =============================================================================
// Signals
// =============================================================================

/** A promise that rejects with CancelledError once the signal aborts. */
export function abortPromise(signal: AbortSignal): { promise: Promise<never>; dispose: () => void } {
  let onAbort: (() => void) | undefined;
  const promise = new Promise<never>((_, reject) => {
    onAbort = () => reject(new CancelledError(abortMessage(signal)));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
  });
  return {
    promise,
    dispose: () => {
      if (onAbort) signal.removeEventListener("abort", onAbort);
    },
  };
}

/**
 * Race `work` against a timeout and a hard-stop signal. The abandoned work
 * promise is still observed by Promise.race, so a late rejection is never
 * unhandled.
 */
export async function raceWithLimits<T>(
  work: Promise<T>,
  options: { timeoutMs?: number; signal?: AbortSignal; what?: string }
): Promise<T> {
  const racers: Promise<T>[] = [work];
  const timeout = options.timeoutMs !== undefined ? createTimeout(options.timeoutMs, options.what) : undefined;
  const aborted = options.signal ? abortPromise(options.signal) : undefined;
  if (timeout) racers.push(timeout.promise);
  if (aborted) racers.push(aborted.promise);
  try {
    return await Promise.race(racers);
  } finally {
    timeout?.clear();
    aborted?.dispose();
  }
}

/** Child controller that aborts when any parent aborts. */
export function linkedController(...parents: AbortSignal[]): { controller: AbortController; dispose: () => void } {
  const controller = new AbortController();
  const listeners: Array<[AbortSignal, () => void]> = [];
  for (const parent of parents) {
    if (parent.aborted) {
      controller.abort(parent.reason);
      break;
    }
    const onAbort = () => controller.abort(parent.reason);
    parent.addEventListener("abort", onAbort, { once: true });
    listeners.push([parent, onAbort]);
  }
  return {
    controller,
    dispose: () => {
      for (const [parent, onAbort] of listeners) parent.removeEventListener("abort", onAbort);
    },
  };
}

function abortMessage(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) return reason.message;
  if (typeof reason === "string") return reason;
  return "Operation cancelled";
}
