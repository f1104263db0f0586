import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a request exceeds the configured timeout threshold.
 * Attached as `cause` of the {@link TwitchAPIError} returned to the caller.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  override name = 'TimeoutError';
  /** Timeout that elapsed, in milliseconds */
  readonly timeout: number;

  /** Creates a new TimeoutError for the elapsed timeout */
  constructor(timeout: number, opts?: ErrorOptions) {
    super(`error request timed out after ${timeout}ms`, opts);
    this.timeout = timeout;
  }
}

/**
 * Checks whether an error is, or wraps, a {@link TimeoutError}.
 */
export function isTimeoutError(error: unknown): boolean {
  return isErrorType(TimeoutError, error);
}

/**
 * Extract a {@link TimeoutError} from an unknown error value, following nested causes.
 */
export function getTimeoutError(error: unknown): null | TimeoutError {
  return unwrapErrorType(TimeoutError, error);
}
