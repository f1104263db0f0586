import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { HTTPError } from '../error/httpError.js';
import { FetchClient } from './client.js';

describe('FetchClient', () => {
  const mockedFetch = vi.fn<typeof fetch>();

  beforeEach(() => {
    mockedFetch.mockReset();
    vi.stubGlobal('fetch', mockedFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('GET', () => {
    it('prefixes the base URL and sends the default headers', async () => {
      const successResponse = new Response('{"id":123}', { status: 200 });
      mockedFetch.mockResolvedValueOnce(successResponse);

      const client = new FetchClient('https://api.example.com', {
        headers: { 'X-RapidAPI-Host': 'example.test', Accept: 'application/json' },
      });

      const [err, response] = await client.get('/get_user_id?channel=ninja');
      expect(err).toBeNull();
      expect(response).toBe(successResponse);
      expect(mockedFetch).toHaveBeenCalledTimes(1);
      expect(mockedFetch).toHaveBeenCalledWith('https://api.example.com/get_user_id?channel=ninja', {
        method: 'GET',
        headers: new Headers({ 'X-RapidAPI-Host': 'example.test', Accept: 'application/json' }),
      });
    });

    it('does not double the slash when the base URL already ends with one', async () => {
      mockedFetch.mockResolvedValueOnce(new Response('{}', { status: 200 }));

      const client = new FetchClient('https://api.example.com/');
      await client.get('get_stream_tags?channel=ninja');

      expect(mockedFetch.mock.calls[0]?.[0]).toBe('https://api.example.com/get_stream_tags?channel=ninja');
    });

    it('merges per-request headers over the defaults', async () => {
      mockedFetch.mockResolvedValueOnce(new Response('{}', { status: 200 }));

      const client = new FetchClient('https://api.example.com', { headers: { 'X-Base': '1', 'X-Extra': '1' } });
      await client.get('data', { headers: { 'X-Extra': '2' } });

      const headers = mockedFetch.mock.calls[0]?.[1]?.headers;
      expect(headers).toEqual(new Headers({ 'X-Base': '1', 'X-Extra': '2' }));
    });

    it('forwards the provided abort signal to fetch', async () => {
      mockedFetch.mockResolvedValueOnce(new Response('{}', { status: 200 }));

      const controller = new AbortController();
      const client = new FetchClient('https://api.example.com');

      const [err] = await client.get('data', { signal: controller.signal });

      expect(err).toBeNull();
      expect(mockedFetch.mock.calls[0]?.[1]?.signal).toBe(controller.signal);
    });
  });

  describe('ERROR', () => {
    it('should return http-error for non-2xx responses', async () => {
      mockedFetch.mockResolvedValueOnce(new Response('{"message":"Not Found"}', { status: 404 }));

      const client = new FetchClient('https://api.example.com');
      const [err, response] = await client.get('get_channel_panels?channel=ninja');

      expect(response).toBeNull();
      expect(err).toBeInstanceOf(HTTPError);
      expect(err instanceof HTTPError && err.status).toBe(404);
      expect(err?.message).toBe('error in GET request in fetchClient, status 404');
    });

    it('reads the body of a non-2xx response and keeps it inspectable', async () => {
      const notFound = new Response('{"message":"Not Found"}', {
        status: 404,
        statusText: 'Not Found',
        headers: { 'Content-Type': 'application/json' },
      });
      mockedFetch.mockResolvedValueOnce(notFound);

      const client = new FetchClient('https://api.example.com');
      const [err] = await client.get('get_user_id?channel=nobody');

      expect(notFound.bodyUsed).toBe(true);
      expect(err).toBeInstanceOf(HTTPError);
      if (!(err instanceof HTTPError)) {
        return;
      }
      expect(err.response.status).toBe(404);
      expect(err.response.statusText).toBe('Not Found');
      expect(err.response.headers.get('content-type')).toBe('application/json');
      expect(await err.response.json()).toStrictEqual({ message: 'Not Found' });
      expect(await err.response.text()).toBe('{"message":"Not Found"}');
    });

    it('wraps fetch rejections', async () => {
      const fetchError = new TypeError('fetch failed');
      mockedFetch.mockRejectedValueOnce(fetchError);

      const client = new FetchClient('https://api.example.com');
      const [err, res] = await client.get('data');

      expect(res).toBeNull();
      expect(err).toStrictEqual(new Error('error wrapping GET request in fetchClient', { cause: fetchError }));
      expect(mockedFetch).toHaveBeenCalledTimes(1);
    });

    it('surfaces the abort reason when the signal fires', async () => {
      mockedFetch.mockImplementationOnce((_input, init) => {
        const signal = init?.signal;
        return signal?.aborted ? Promise.reject(signal.reason) : Promise.resolve(new Response('{}'));
      });

      const reason = new Error('aborted before sending');
      const controller = new AbortController();
      controller.abort(reason);

      const client = new FetchClient('https://api.example.com');
      const [err, res] = await client.get('data', { signal: controller.signal });

      expect(res).toBeNull();
      expect(err?.cause).toBe(reason);
    });
  });
});
