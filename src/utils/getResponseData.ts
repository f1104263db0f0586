import { DecodeError } from '../error/decodeError.js';
import { TwitchAPIError } from '../error/twitchApiError.js';
import type { JsonValue } from '../types/json.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Reads a successful response body and decodes it as JSON.
 *
 * - The body is always read as text first, so a failed parse can still report what was received.
 * - A body that cannot be read yields a {@link TwitchAPIError} with the read failure as `cause` and no `status`.
 * - An empty or non-JSON body yields a {@link DecodeError}, regardless of `Content-Type`.
 * - The decoded value is returned as is; no schema is applied.
 */
export async function getResponseData(response: Response): SafeWrapAsync<TwitchAPIError, JsonValue> {
  const { status } = response;

  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new TwitchAPIError('error reading response body', { cause: errText }), null];
  }

  const [errJson, json] = safeWrap((): JsonValue => JSON.parse(text));
  if (errJson) {
    return [new DecodeError('error decoding json response body', text, { status, cause: errJson }), null];
  }

  return [null, json];
}
