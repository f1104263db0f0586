import type { TwitchAPIError } from '../error/twitchApiError.js';
import type { JsonValue } from '../types/json.js';
import type { FetchClientProvider } from '../types/request.js';
import { validator } from '../utils/validator.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { type ClientConfig, type ClientConfigProps, createClientConfig } from './config.js';
import { RequestDispatcher } from './dispatcher.js';
import { type Endpoint, type EndpointDefinition, type EndpointParams, endpoints } from './endpoints.js';

/** Configuration for constructing a {@link TwitchClient}, extends {@link ClientConfigProps}. */
export interface TwitchClientProps extends ClientConfigProps {
  /** Transport implementation used for requests. Defaults to `FetchClient`. */
  fetchProvider?: FetchClientProvider;
}

/**
 * Read-only client for Twitch data served through the `twitch-api8` RapidAPI gateway.
 *
 * Every accessor validates its identifiers, then forwards to one GET against the gateway and
 * returns the decoded JSON payload untouched. Results are error-first tuples via
 * {@link SafeWrapAsync}; calls never reject.
 *
 * Rate limits of the gateway plan are not enforced here, callers pace their own requests.
 *
 * @example
 * ```typescript
 * const twitch = new TwitchClient({ apiKey: process.env.RAPIDAPI_KEY ?? '' })
 *
 * const [err, info] = await twitch.getStreamerInfo('ninja')
 * if (err) {
 *   console.error(err.status, err.message)
 * }
 * ```
 */
export class TwitchClient {
  /** Dispatcher every accessor funnels through. */
  #dispatcher: RequestDispatcher;

  /**
   * @throws {ConfigurationError} when the API key is missing, empty or not sendable as a header, the timeout is
   *   out of range, or an extra header is invalid.
   */
  constructor(props: TwitchClientProps) {
    const config = createClientConfig(props);
    this.#dispatcher = new RequestDispatcher(config, props.fetchProvider);
  }

  /** Resolved configuration of this client. */
  get config(): ClientConfig {
    return this.#dispatcher.config;
  }

  /** Endpoint table the accessors are built from. */
  get endpoints(): typeof endpoints {
    return endpoints;
  }

  /**
   * Generic entry the accessors forward to: validates `params` against the endpoint's schema
   * and dispatches the request. A failed validation returns a `ValidationError` without any I/O.
   *
   * @param endpoint - Endpoint name, see {@link endpoints}.
   * @param params - Identifiers required by that endpoint.
   */
  async request<E extends Endpoint>(endpoint: E, params: EndpointParams<E>): SafeWrapAsync<TwitchAPIError, JsonValue> {
    const definition: EndpointDefinition = endpoints[endpoint];

    const [errParams, search] = await validator(params, definition.params, `error validating params for ${endpoint}`);
    if (errParams) {
      return [errParams, null];
    }

    return this.#dispatcher.fetch(definition.path, search);
  }

  /** Panels shown below a channel's stream. */
  getChannelPanels(channel: string): SafeWrapAsync<TwitchAPIError, JsonValue> {
    return this.request('channelPanels', { channel });
  }

  /** Viewer card of `username` as seen in `channel`'s chat. */
  getViewerCard(channel: string, username: string): SafeWrapAsync<TwitchAPIError, JsonValue> {
    return this.request('viewerCard', { channel, username });
  }

  /** Streamer profile, including live status. */
  getStreamerInfo(channel: string): SafeWrapAsync<TwitchAPIError, JsonValue> {
    return this.request('streamerInfo', { channel });
  }

  /** Recent videos of a channel. */
  getChannelVideos(channel: string): SafeWrapAsync<TwitchAPIError, JsonValue> {
    return this.request('channelVideos', { channel });
  }

  /** Current viewer count of a stream. */
  getStreamViewers(channel: string): SafeWrapAsync<TwitchAPIError, JsonValue> {
    return this.request('streamViewers', { channel });
  }

  /** Twitch user id of a channel. */
  getUserId(channel: string): SafeWrapAsync<TwitchAPIError, JsonValue> {
    return this.request('userId', { channel });
  }

  getChannelPointsContext(channel: string): SafeWrapAsync<TwitchAPIError, JsonValue> {
    return this.request('channelPointsContext', { channel });
  }

  getChatRestrictions(channel: string): SafeWrapAsync<TwitchAPIError, JsonValue> {
    return this.request('chatRestrictions', { channel });
  }

  getPinnedChat(channel: string): SafeWrapAsync<TwitchAPIError, JsonValue> {
    return this.request('pinnedChat', { channel });
  }

  /** Active follower/subscriber goals. */
  getChannelGoals(channel: string): SafeWrapAsync<TwitchAPIError, JsonValue> {
    return this.request('channelGoals', { channel });
  }

  getChannelLeaderboards(channel: string): SafeWrapAsync<TwitchAPIError, JsonValue> {
    return this.request('channelLeaderboards', { channel });
  }

  getStreamTags(channel: string): SafeWrapAsync<TwitchAPIError, JsonValue> {
    return this.request('streamTags', { channel });
  }
}
