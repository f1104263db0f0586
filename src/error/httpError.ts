import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a gateway response with a non-2xx status code.
 * Attached as `cause` of the {@link TwitchAPIError} returned to the caller.
 */
export class HTTPError extends Error {
  /** HTTPError error-name */
  override name = 'HTTPError';

  /** Response causing the HTTPError */
  #response: Response;

  /** Creates a new HTTPError wrapping the failed response */
  constructor(response: Response, message = `HTTP Error: ${response.status}`, opts?: ErrorOptions) {
    super(message, opts);
    this.#response = response;
  }

  /** Status code of the failed response */
  get status(): number {
    return this.#response.status;
  }

  /**
   * Response causing the HTTPError. Cloned when possible, so the body can still be read.
   */
  get response(): Response {
    return typeof this.#response.clone === 'function' ? this.#response.clone() : this.#response;
  }
}

/**
 * Checks whether an error is, or wraps, an {@link HTTPError}.
 */
export function isHttpError(error: unknown): boolean {
  return isErrorType(HTTPError, error);
}

/**
 * Extracts an {@link HTTPError} from an unknown error value, following nested causes.
 */
export function getHttpError(error: unknown): null | HTTPError {
  return unwrapErrorType(HTTPError, error);
}
