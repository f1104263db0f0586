import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Turns a settled standard-schema result into a tuple, rejecting anything that
 * does not look like a result.
 */
function settle<Output>(
  result: StandardSchemaV1.Result<Output> | null | undefined,
  message: string,
): SafeWrap<ValidationError, Output> {
  if (!result || typeof result !== 'object') {
    return [new ValidationError(`${message}, schema returned no result`), null];
  }

  if (result.issues) {
    return [new ValidationError(message, [...result.issues]), null];
  }

  if (!('value' in result)) {
    return [new ValidationError(`${message}, schema returned no value`), null];
  }

  return [null, result.value];
}

/**
 * Validates an input value against a StandardSchemaV1 schema (zod, valibot, …) and wraps the
 * result in a tuple-style `[error, value]` response.
 *
 * - The schema may validate synchronously or asynchronously.
 * - A schema that throws or rejects yields a {@link ValidationError} with the failure as `cause`.
 * - Reported issues yield a {@link ValidationError} carrying them.
 * - On success the schema output is returned, so trims and other transforms apply.
 */
export async function validator<Input, Output>(
  input: unknown,
  schema: StandardSchemaV1<Input, Output>,
  message = 'error validating data',
): SafeWrapAsync<ValidationError, Output> {
  const [err, result] = safeWrap(() => schema['~standard'].validate(input));
  if (err) {
    return [new ValidationError(`${message}, schema threw`, [], { cause: err }), null];
  }

  if (!(result instanceof Promise)) {
    return settle(result, message);
  }

  const [errAsync, resultAsync] = await safeWrapAsync(() => result);
  if (errAsync) {
    return [new ValidationError(`${message}, schema rejected`, [], { cause: errAsync }), null];
  }

  return settle(resultAsync, message);
}

/**
 * Synchronous variant of {@link validator}, for places that cannot await (e.g. constructors).
 * Schemas that only validate asynchronously are reported as a {@link ValidationError}.
 */
export function validateSync<Input, Output>(
  input: unknown,
  schema: StandardSchemaV1<Input, Output>,
  message = 'error validating data',
): SafeWrap<ValidationError, Output> {
  const [err, result] = safeWrap(() => schema['~standard'].validate(input));
  if (err) {
    return [new ValidationError(`${message}, schema threw`, [], { cause: err }), null];
  }

  if (result instanceof Promise) {
    // Nothing will observe the result, keep a late rejection from going unhandled.
    result.catch(() => undefined);
    return [new ValidationError(`${message}, schema validates asynchronously`), null];
  }

  return settle(result, message);
}
