/**
 * Root entrypoint: re-exports the Twitch client, its types, the default transport and the error taxonomy.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/**
 * Read-only Twitch client and the options it accepts.
 */
export { TwitchClient, type TwitchClientProps } from './core/client.js';

/**
 * Resolved client settings and how they are built.
 */
export { type ClientConfig, type ClientConfigProps, createClientConfig } from './core/config.js';

/**
 * Single request funnel every accessor goes through.
 */
export { RequestDispatcher } from './core/dispatcher.js';

/**
 * Endpoint table the accessors are built from.
 */
export { type Endpoint, type EndpointDefinition, type EndpointParams, endpoints } from './core/endpoints.js';

/**
 * Default transport around the global `fetch`, and the contract a replacement must satisfy.
 */
export {
  FetchClient,
  type FetchClientOptions,
  type FetchClientProvider,
  type FetchClientProviderDefinition,
  type FetchOptions,
} from './fetch/index.js';

/**
 * Decoded response payloads.
 */
export type { JsonObject, JsonPrimitive, JsonValue } from './types/json.js';

/**
 * Error-first result tuples returned by every call.
 */
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';

/**
 * Verbosity of the client's diagnostic logging.
 */
export type { LogLevel } from './utils/logger.js';

/**
 * Umbrella error for every failed call.
 */
export { TwitchAPIError } from './error/twitchApiError.js';

/**
 * Error thrown when the client is constructed with missing or invalid settings.
 */
export { ConfigurationError } from './error/configurationError.js';

/**
 * Error returned when call parameters fail validation.
 */
export { ValidationError } from './error/validationError.js';

/**
 * Error returned when a successful response body is not valid JSON.
 */
export { DecodeError } from './error/decodeError.js';

/**
 * Error representing a non-2xx HTTP response.
 */
export { HTTPError } from './error/httpError.js';

/**
 * Error thrown when a request exceeds the configured timeout.
 */
export { TimeoutError } from './error/timeoutError.js';

/** Recursively unwraps nested causes to find a specific error class. */
export { unwrapErrorType } from './error/unwrapErrorType.js';

/** Generic check that matches an error constructor against an unknown error. */
export { isErrorType } from './error/isErrorType.js';
