import { HTTPError } from '../error/httpError.js';
import type {
  FetchClientOptions,
  FetchClientProviderDefinition,
  FetchOptions,
  HeaderOptions,
} from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { bufferResponse, mergeHeaderOptions } from './utils.js';

/**
 * Thin wrapper around the native `fetch` API, created once per client and reused for every call.
 *
 * - prefixes all requests with the configured base URL,
 * - sends the default headers merged with per-request ones,
 * - returns error-first tuples via {@link SafeWrapAsync}; it never throws.
 *
 * Holds no per-call state, so concurrent calls can share one instance.
 */
export class FetchClient implements FetchClientProviderDefinition {
  /** Base URL prepended to all request paths, always ending in `/`. */
  readonly #baseUrl: string;
  /** Headers sent with every request. */
  readonly #headers: HeaderOptions;

  /** Creates a new instance of the fetch-client, with a base-url + options */
  constructor(baseUrl: string, opts: FetchClientOptions = {}) {
    this.#baseUrl = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
    this.#headers = mergeHeaderOptions(opts.headers);
  }

  /**
   * Executes a GET request against the given endpoint.
   *
   * Errors:
   * - Network / fetch errors (including aborts) are wrapped in `Error`, with the original as `cause`.
   * - Non-2xx responses are wrapped in `HTTPError`, their body read so the connection is released.
   *
   * @param endpoint - Relative endpoint path, including its query (e.g. `get_user_id?channel=ninja`).
   * @param opts - Request options merged with the client's defaults.
   * @returns A promise resolving to `[error, response]`.
   */
  async get(endpoint: string, opts: FetchOptions = {}): SafeWrapAsync<Error, Response> {
    const [err, res] = await safeWrapAsync(() =>
      fetch(this.#constructPath(endpoint), {
        method: 'GET',
        headers: mergeHeaderOptions(this.#headers, opts.headers),
        ...(opts.signal && { signal: opts.signal }),
      }),
    );

    if (err) {
      return [new Error('error wrapping GET request in fetchClient', { cause: err }), null];
    }

    if (!res.ok) {
      const buffered = await bufferResponse(res);
      return [new HTTPError(buffered, `error in GET request in fetchClient, status ${res.status}`), null];
    }

    return [null, res];
  }

  /**
   * Joins the base URL and endpoint into a single URL string.
   * Strips a leading slash from the endpoint to avoid `//` in the URL.
   */
  #constructPath(endpoint: string): string {
    return `${this.#baseUrl}${endpoint.replace(/^\/+/, '')}`;
  }
}
