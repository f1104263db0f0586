import { isErrorType } from './isErrorType.js';
import { TwitchAPIError, type TwitchAPIErrorOptions } from './twitchApiError.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a successful response whose body is not valid JSON.
 */
export class DecodeError extends TwitchAPIError {
  /** DecodeError error-name */
  override name = 'DecodeError';
  /** Raw body as received */
  #body: string;

  /** Creates a new DecodeError holding the body that failed to decode */
  constructor(message: string, body: string, opts?: TwitchAPIErrorOptions) {
    super(message, opts);
    this.#body = body;
  }

  /** Raw response body that could not be decoded */
  get body(): string {
    return this.#body;
  }
}

/**
 * Checks whether an error is, or wraps, a {@link DecodeError}.
 */
export function isDecodeError(error: unknown): boolean {
  return isErrorType(DecodeError, error);
}

/**
 * Extract a {@link DecodeError} from an unknown error value, following nested causes.
 */
export function getDecodeError(error: unknown): null | DecodeError {
  return unwrapErrorType(DecodeError, error);
}
