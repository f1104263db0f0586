import type { StandardSchemaV1 } from '@standard-schema/spec';
import { z } from 'zod';
import type { SearchParams } from '../types/request.js';

/** One gateway endpoint: its path and the schema its query parameters must satisfy. */
export interface EndpointDefinition {
  /** Path relative to the gateway base URL. */
  path: string;
  /** Schema validating the caller's parameters into the query that is sent. */
  params: StandardSchemaV1<unknown, SearchParams>;
}

/** Map of accessor name → endpoint definition. */
export type EndpointDefinitions = Record<string, EndpointDefinition>;

/** Twitch identifiers are sent trimmed and must not be blank. */
const identifier = (name: string) =>
  z
    .string({ required_error: `${name} is required`, invalid_type_error: `${name} must be a string` })
    .trim()
    .min(1, `${name} must not be empty`);

const channelParams = z.object({ channel: identifier('channel') });

/**
 * Every lookup the gateway serves. Each accessor on {@link TwitchClient} forwards to one entry.
 */
export const endpoints = {
  channelPanels: { path: 'get_channel_panels', params: channelParams },
  viewerCard: {
    path: 'get_viewer_card',
    params: z.object({ channel: identifier('channel'), username: identifier('username') }),
  },
  streamerInfo: { path: 'get_streamer_info', params: channelParams },
  channelVideos: { path: 'get_channel_videos', params: channelParams },
  streamViewers: { path: 'get_stream_viewers', params: channelParams },
  userId: { path: 'get_user_id', params: channelParams },
  channelPointsContext: { path: 'get_channel_points_context', params: channelParams },
  chatRestrictions: { path: 'get_chat_restrictions', params: channelParams },
  pinnedChat: { path: 'get_pinned_chat', params: channelParams },
  channelGoals: { path: 'get_channel_goals', params: channelParams },
  channelLeaderboards: { path: 'get_channel_leaderboards', params: channelParams },
  streamTags: { path: 'get_stream_tags', params: channelParams },
} as const satisfies EndpointDefinitions;

/** Name of a gateway endpoint. */
export type Endpoint = keyof typeof endpoints;

/** Parameters a caller passes for an endpoint, e.g. `{ channel: string }`. */
export type EndpointParams<E extends Endpoint> = StandardSchemaV1.InferInput<(typeof endpoints)[E]['params']>;
