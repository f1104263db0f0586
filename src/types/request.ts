import type { SafeWrapAsync } from '../utils/wrap.js';

/** Header options accepted by the fetch wrapper; `null`/`undefined` values remove a header. */
export type HeaderOptions = NonNullable<RequestInit['headers']> | Record<string, string | null | undefined>;

/** Query parameters sent with a request, name → value. */
export type SearchParams = Readonly<Record<string, string>>;

/** Per-request options handed to the transport. */
export interface FetchOptions {
  /** Headers merged over the transport defaults. */
  headers?: HeaderOptions;
  /** Signal aborting the request, e.g. on timeout. */
  signal?: AbortSignal;
}

/** Options to configure a transport instance. */
export interface FetchClientOptions {
  /** Headers sent with every request. */
  headers?: HeaderOptions;
}

/**
 * Contract for the transport used by the dispatcher. Implementations resolve network
 * failures and non-2xx responses into the error side of the tuple instead of throwing.
 */
export interface FetchClientProviderDefinition {
  /** Executes a GET request for an endpoint relative to the base URL. */
  get: (endpoint: string, options: FetchOptions) => SafeWrapAsync<Error, Response>;
}

/** Factory signature for constructing transports, e.g. {@link FetchClient} or a test stub. */
export interface FetchClientProvider {
  /** Creates a new transport bound to a base URL + default options */
  new (baseUrl: string, opts: FetchClientOptions): FetchClientProviderDefinition;
}
