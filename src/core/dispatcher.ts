import { getHttpError, HTTPError } from '../error/httpError.js';
import { isTimeoutError } from '../error/timeoutError.js';
import { TwitchAPIError } from '../error/twitchApiError.js';
import { FetchClient } from '../fetch/client.js';
import { bufferResponse } from '../fetch/utils.js';
import type { JsonValue } from '../types/json.js';
import type { FetchClientProvider, FetchClientProviderDefinition, SearchParams } from '../types/request.js';
import { constructUrl } from '../utils/constructUrl.js';
import { getResponseData } from '../utils/getResponseData.js';
import { Logger } from '../utils/logger.js';
import { createTimeoutSignal } from '../utils/signals.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import type { ClientConfig } from './config.js';

/**
 * Single funnel for every gateway call.
 *
 * Owns the resolved {@link ClientConfig} and one transport instance reused across calls.
 * Each {@link RequestDispatcher.fetch} performs exactly one GET: no retries, no caching.
 */
export class RequestDispatcher {
  /** Frozen configuration for this dispatcher. */
  #config: ClientConfig;
  /** Transport shared by all calls; holds no per-call state. */
  #fetchClient: FetchClientProviderDefinition;
  /** Diagnostic logger, silent unless `logLevel` says otherwise. */
  #logger: Logger;

  /**
   * @param config - Resolved configuration, see `createClientConfig`.
   * @param fetchProvider - Transport implementation. Defaults to {@link FetchClient}.
   */
  constructor(config: ClientConfig, fetchProvider: FetchClientProvider = FetchClient) {
    this.#config = config;
    this.#logger = new Logger(config.logLevel);
    this.#fetchClient = new fetchProvider(config.baseUrl, { headers: config.headers });

    this.#logger.trace('created request dispatcher', {
      baseUrl: config.baseUrl,
      headers: config.headers,
      timeout: config.timeout,
    });
  }

  /** Configuration the dispatcher was created with. */
  get config(): ClientConfig {
    return this.#config;
  }

  /**
   * Issues a GET for `path` with `searchParams` as query, and decodes the JSON body.
   *
   * - Blank path or parameter values: `ValidationError`, nothing is sent.
   * - Non-2xx: `TwitchAPIError` with `status`, cause `HTTPError`.
   * - Timeout: `TwitchAPIError` with a `TimeoutError` in its cause chain.
   * - Network failure: `TwitchAPIError` with the transport error as cause.
   * - 2xx with a body that is not JSON: `DecodeError`.
   *
   * @param path - Endpoint path relative to the gateway, e.g. `get_streamer_info`.
   * @param searchParams - Query parameters, name → non-empty value.
   * @returns A promise resolving to `[error, payload]`; it never rejects.
   */
  async fetch(path: string, searchParams: SearchParams = {}): SafeWrapAsync<TwitchAPIError, JsonValue> {
    const [errUrl, url] = constructUrl(path, searchParams);
    if (errUrl) {
      this.#logger.debug('rejected request before sending', { path, error: errUrl });
      return [errUrl, null];
    }

    this.#logger.debug(`sending GET ${url}`);

    const timeout = createTimeoutSignal(this.#config.timeout);
    const result = await this.#send(url, timeout?.signal);
    timeout?.clear();

    const [err] = result;
    if (err) {
      this.#logger.info(`GET ${url} failed`, { error: err, status: err.status });
    }

    return result;
  }

  /**
   * Runs the transport call and body decoding under one abort signal, mapping
   * every failure onto the {@link TwitchAPIError} family.
   */
  async #send(url: string, signal?: AbortSignal): SafeWrapAsync<TwitchAPIError, JsonValue> {
    // A transport that throws instead of returning a tuple is treated like a network failure.
    const [errCall, wrapped] = await safeWrapAsync(() => this.#fetchClient.get(url, signal ? { signal } : {}));
    if (errCall) {
      return [this.#toTransportError(url, errCall), null];
    }

    const [errResponse, response] = wrapped;
    if (errResponse) {
      return [this.#toTransportError(url, errResponse), null];
    }

    if (response.status < 200 || response.status > 299) {
      const buffered = await bufferResponse(response);
      return [this.#toTransportError(url, new HTTPError(buffered)), null];
    }

    this.#logger.info(`GET ${url} ${response.status}`);

    return getResponseData(response);
  }

  #toTransportError(url: string, err: Error): TwitchAPIError {
    const httpError = getHttpError(err);
    if (httpError) {
      return new TwitchAPIError(`error in GET ${url}, gateway responded ${httpError.status}`, {
        status: httpError.status,
        cause: err,
      });
    }

    if (isTimeoutError(err)) {
      return new TwitchAPIError(`error in GET ${url}, timed out after ${this.#config.timeout}ms`, { cause: err });
    }

    return new TwitchAPIError(`error in GET ${url}, request failed`, { cause: err });
  }
}
