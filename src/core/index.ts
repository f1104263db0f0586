/**
 * Core entrypoint: exports the client, its dispatcher, configuration and the endpoint table.
 * Import from here if you only need the client without error helpers.
 * @module
 */

/** Read-only Twitch client with one accessor per gateway lookup. */
export { TwitchClient, type TwitchClientProps } from './client.js';

/** Resolves and validates client settings. */
export { type ClientConfig, type ClientConfigProps, createClientConfig } from './config.js';

/** Gateway constants. */
export {
  API_KEY_HEADER,
  DEFAULT_TIMEOUT,
  GATEWAY_BASE_URL,
  GATEWAY_HOST,
  HOST_HEADER,
  MAX_TIMEOUT,
} from './constants.js';

/** Single request funnel shared by all accessors. */
export { RequestDispatcher } from './dispatcher.js';

/** Declarative endpoint table. */
export {
  type Endpoint,
  type EndpointDefinition,
  type EndpointDefinitions,
  type EndpointParams,
  endpoints,
} from './endpoints.js';
