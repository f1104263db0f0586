import type { HeaderOptions } from '../types/request.js';
import { safeWrap, safeWrapAsync } from '../utils/wrap.js';

/**
 * Turns a header value into its string form, or `null` for values that cannot be sent.
 */
function toHeaderValue(value: unknown): string | null {
  switch (typeof value) {
    case 'string':
      return value;
    case 'number':
    case 'boolean':
    case 'bigint':
      return String(value);
    default:
      return null;
  }
}

/**
 * Normalizes the different header container shapes into a consistent iterable.
 */
function toEntries(headers?: HeaderOptions): Iterable<[string, unknown]> {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return headers.entries();
  }

  if (Array.isArray(headers)) {
    return headers.map(([key, value]): [string, unknown] => [key, value]);
  }

  return Object.entries(headers);
}

/**
 * Merges header layers into a single `Headers` instance, later layers winning.
 * Keys are case-insensitive; a `null`/`undefined` value removes what earlier layers set.
 */
export function mergeHeaderOptions(...layers: Array<HeaderOptions | undefined>): Headers {
  const merged = new Headers();

  for (const layer of layers) {
    for (const [key, value] of toEntries(layer)) {
      if (value === null || value === undefined) {
        merged.delete(key);
        continue;
      }

      const clean = toHeaderValue(value);
      if (clean !== null) {
        merged.set(key, clean);
      }
    }
  }

  return merged;
}

/** Statuses whose responses may not carry a body. */
const NULL_BODY_STATUSES = new Set([101, 103, 204, 205, 304]);

/**
 * Reads a response body to the end and returns a detached copy holding it, so the
 * connection is released while the copy can still be inspected later.
 *
 * A body that fails to read is dropped from the copy. Where no copy can be built
 * the consumed original is returned.
 */
export async function bufferResponse(response: Response): Promise<Response> {
  const init: ResponseInit = { status: response.status, statusText: response.statusText, headers: response.headers };

  const [errRead, body] = await safeWrapAsync(() => response.arrayBuffer());
  let content: ArrayBuffer | null = null;
  if (!errRead && !NULL_BODY_STATUSES.has(response.status)) {
    content = body;
  }

  const [errCopy, copy] = safeWrap(() => new Response(content, init));
  return errCopy ? response : copy;
}
