/** Host of the RapidAPI gateway serving Twitch data */
export const GATEWAY_HOST = 'twitch-api8.p.rapidapi.com';

/** Base URL every endpoint path is appended to */
export const GATEWAY_BASE_URL = `https://${GATEWAY_HOST}`;

/** Header carrying the RapidAPI key */
export const API_KEY_HEADER = 'X-RapidAPI-Key';

/** Header naming the gateway host the key is scoped to */
export const HOST_HEADER = 'X-RapidAPI-Host';

/** Default request timeout in milliseconds */
export const DEFAULT_TIMEOUT = 30_000;

/** Largest delay a timer accepts, in milliseconds */
export const MAX_TIMEOUT = 2_147_483_647;
