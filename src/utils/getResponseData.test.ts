import { describe, expect, it } from 'vitest';
import { DecodeError } from '../error/decodeError.js';
import { TwitchAPIError } from '../error/twitchApiError.js';
import { getResponseData } from './getResponseData.js';

describe('getResponseData', () => {
  it('returns the decoded object as is', async () => {
    const response = new Response('{"user":{"id":"123","displayName":"Ninja"}}', {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });

    const [err, value] = await getResponseData(response);
    expect(err).toBeNull();
    expect(value).toStrictEqual({ user: { id: '123', displayName: 'Ninja' } });
  });

  it('decodes arrays and scalars', async () => {
    const [, list] = await getResponseData(new Response('[1,"two",null]'));
    const [, scalar] = await getResponseData(new Response('false'));

    expect(list).toStrictEqual([1, 'two', null]);
    expect(scalar).toBe(false);
  });

  it('ignores the content type and still expects JSON', async () => {
    const response = new Response('{"tags":[]}', { headers: { 'Content-Type': 'text/plain' } });

    const [err, value] = await getResponseData(response);
    expect(err).toBeNull();
    expect(value).toStrictEqual({ tags: [] });
  });

  it('returns DecodeError for a non-JSON body', async () => {
    const [err, value] = await getResponseData(new Response('not-json', { status: 200 }));

    expect(value).toBeNull();
    expect(err).toBeInstanceOf(DecodeError);
    expect(err?.status).toBe(200);
    expect(err?.cause).toBeInstanceOf(SyntaxError);
    expect(err instanceof DecodeError && err.body).toBe('not-json');
  });

  it('returns DecodeError for an empty body', async () => {
    const [err] = await getResponseData(new Response('', { status: 200 }));

    expect(err).toBeInstanceOf(DecodeError);
    expect(err?.message).toBe('error decoding json response body');
  });

  it('returns TwitchAPIError when the body cannot be read', async () => {
    const readFailure = new TypeError('terminated');
    const response = {
      status: 200,
      text: () => Promise.reject(readFailure),
    } as unknown as Response;

    const [err, value] = await getResponseData(response);
    expect(value).toBeNull();
    expect(err).toBeInstanceOf(TwitchAPIError);
    expect(err).not.toBeInstanceOf(DecodeError);
    expect(err?.message).toBe('error reading response body');
    expect(err?.cause).toBe(readFailure);
    expect(err?.status).toBeUndefined();
  });
});
