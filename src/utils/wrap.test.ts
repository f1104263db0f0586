import { describe, expect, it } from 'vitest';
import { safeWrap, safeWrapAsync, toError } from './wrap.js';

class CustomError extends Error {
  override name = 'CustomError';
}

describe('safeWrap', () => {
  it('returns [null, data] when the function succeeds', () => {
    const [err, data] = safeWrap(() => 42);

    expect(err).toBeNull();
    expect(data).toBe(42);
  });

  it('returns [error, null] when JSON.parse throws', () => {
    const [err, data] = safeWrap(() => JSON.parse('not-json'));

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(SyntaxError);
  });

  it('keeps custom error instances as they are', () => {
    const thrown = new CustomError('custom boom');
    const [err] = safeWrap(() => {
      throw thrown;
    });

    expect(err).toBe(thrown);
  });
});

describe('safeWrapAsync', () => {
  it('returns [null, data] when the promise resolves', async () => {
    const [err, data] = await safeWrapAsync(() => Promise.resolve('ok'));

    expect(err).toBeNull();
    expect(data).toBe('ok');
  });

  it('returns [error, null] when the promise rejects', async () => {
    const [err, data] = await safeWrapAsync(() => Promise.reject(new Error('async boom')));

    expect(data).toBeNull();
    expect(err?.message).toBe('async boom');
  });

  it('catches synchronous throws inside the factory', async () => {
    const [err, data] = await safeWrapAsync((): Promise<string> => {
      throw new Error('sync boom');
    });

    expect(data).toBeNull();
    expect(err?.message).toBe('sync boom');
  });
});

describe('toError', () => {
  it('wraps strings as the message', () => {
    expect(toError('boom').message).toBe('boom');
  });

  it('keeps other values as cause', () => {
    const value = { code: 'ECONNRESET' };
    const err = toError(value);

    expect(err.message).toBe('error non-error value thrown');
    expect(err.cause).toBe(value);
  });
});
