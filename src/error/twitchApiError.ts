import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Options accepted by {@link TwitchAPIError} and its refinements. */
export interface TwitchAPIErrorOptions extends ErrorOptions {
  /** HTTP status returned by the gateway, when the failure came from a response. */
  status?: number;
}

/**
 * Umbrella error for every failed call against the gateway.
 *
 * Refined by {@link ConfigurationError}, {@link ValidationError} and {@link DecodeError};
 * transport failures carry the low-level error (network, {@link TimeoutError},
 * {@link HTTPError}) as `cause`.
 */
export class TwitchAPIError extends Error {
  /** TwitchAPIError error-name */
  override name = 'TwitchAPIError';

  /** Upstream HTTP status, if any */
  #status: number | undefined;

  /** Creates a new TwitchAPIError, optionally with the upstream status and originating cause */
  constructor(message: string, opts?: TwitchAPIErrorOptions) {
    super(message, opts);
    this.#status = opts?.status;
  }

  /** HTTP status returned by the gateway, `undefined` when no response was received */
  get status(): number | undefined {
    return this.#status;
  }
}

/**
 * Checks whether an error is, or wraps, a {@link TwitchAPIError}.
 */
export function isTwitchAPIError(error: unknown): boolean {
  return isErrorType(TwitchAPIError, error);
}

/**
 * Extract a {@link TwitchAPIError} from an unknown error value, following nested causes.
 */
export function getTwitchAPIError(error: unknown): null | TwitchAPIError {
  return unwrapErrorType(TwitchAPIError, error);
}
