import type { StandardSchemaV1 } from '@standard-schema/spec';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { ValidationError } from '../error/validationError.js';
import { validateSync, validator } from './validator.js';

type Validate<Output> = (
  value: unknown,
) => StandardSchemaV1.Result<Output> | Promise<StandardSchemaV1.Result<Output>>;

function schemaOf<Output>(validate: Validate<Output>) {
  const schema: StandardSchemaV1<unknown, Output> = {
    '~standard': { version: 1, vendor: 'test', validate },
  };
  return schema;
}

describe('validator', () => {
  it('correct schema validates to correct', async () => {
    const data = { channel: 'ninja' };
    const [err, parsed] = await validator(data, z.object({ channel: z.string() }));

    expect(err).toBeNull();
    expect(parsed).toEqual(data);
  });

  it('returns the transformed output', async () => {
    const [err, parsed] = await validator({ channel: '  xqc ' }, z.object({ channel: z.string().trim() }));

    expect(err).toBeNull();
    expect(parsed).toEqual({ channel: 'xqc' });
  });

  it('returns issues from the schema', async () => {
    const [err, value] = await validator({ channel: 1 }, z.object({ channel: z.string() }), 'error validating params');

    expect(value).toBeNull();
    expect(err).toBeInstanceOf(ValidationError);
    expect(err?.issues).toHaveLength(1);
    expect(err?.issues[0]?.path).toEqual(['channel']);
  });

  it('returns error when sync validation throws', async () => {
    const [err, value] = await validator(
      {},
      schemaOf(() => {
        throw new Error('oops');
      }),
    );

    expect(value).toBeNull();
    expect(err?.message).toBe('error validating data, schema threw');
    expect(err?.cause).toBeInstanceOf(Error);
  });

  it('returns error when async validation rejects', async () => {
    const [err, value] = await validator(
      {},
      schemaOf(() => Promise.reject(new Error('oops'))),
    );

    expect(value).toBeNull();
    expect(err?.message).toBe('error validating data, schema rejected');
  });

  it('returns value when async validation resolves', async () => {
    const [err, value] = await validator(
      'test',
      schemaOf(async (input) => ({ value: String(input) })),
    );

    expect(err).toBeNull();
    expect(value).toBe('test');
  });
});

describe('validateSync', () => {
  it('validates synchronously', () => {
    const [err, value] = validateSync({ apiKey: 'test-key' }, z.object({ apiKey: z.string().min(1) }));

    expect(err).toBeNull();
    expect(value).toEqual({ apiKey: 'test-key' });
  });

  it('reports issues', () => {
    const [err] = validateSync({ apiKey: '' }, z.object({ apiKey: z.string().min(1, 'API key is required') }));

    expect(err?.message).toBe('error validating data: apiKey: API key is required');
  });

  it('refuses async schemas', () => {
    const [err, value] = validateSync(
      'test',
      schemaOf(async (input) => ({ value: String(input) })),
    );

    expect(value).toBeNull();
    expect(err?.message).toBe('error validating data, schema validates asynchronously');
  });
});
