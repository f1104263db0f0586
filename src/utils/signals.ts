import { TimeoutError } from '../error/timeoutError.js';

/** Abort signal bound to a timer, plus a way to release the timer early. */
export interface TimeoutSignal {
  /** Signal that aborts with a {@link TimeoutError} once the timeout elapses. */
  signal: AbortSignal;
  /** Clears the pending timer; call once the guarded work has settled. */
  clear: () => void;
}

/**
 * Creates an {@link AbortSignal} that will automatically abort after
 * the specified timeout, with a {@link TimeoutError} as its reason.
 *
 * When `timeoutMs` is `false` or `0`, no timeout signal is created.
 *
 * @param timeoutMs - Timeout in milliseconds, or `false` to disable.
 * @returns The signal with its release handle, or `null`.
 */
export function createTimeoutSignal(timeoutMs?: number | false): TimeoutSignal | null {
  if (!timeoutMs) {
    return null;
  }

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(new TimeoutError(timeoutMs)), timeoutMs);
  const clear = () => clearTimeout(timeout);

  controller.signal.addEventListener('abort', clear, { once: true });

  return { signal: controller.signal, clear };
}
