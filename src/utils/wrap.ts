/**
 * Error-first result tuple, `[error, data]`. Exactly one side is non-null.
 */
export type SafeWrap<ErrorType extends Error = Error, DataType = unknown> =
  | [error: ErrorType, data: null]
  | [error: null, data: DataType];

/**
 * Async variant of {@link SafeWrap}.
 */
export type SafeWrapAsync<ErrorType extends Error = Error, DataType = unknown> = Promise<SafeWrap<ErrorType, DataType>>;

/**
 * Normalizes anything thrown into an `Error`, keeping non-error values as `cause`.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }

  if (typeof value === 'string') {
    return new Error(value);
  }

  return new Error('error non-error value thrown', { cause: value });
}

/**
 * Runs a promise factory and settles it into a tuple instead of throwing.
 * @example
 * const [error, data] = await safeWrapAsync(() => fetch(url));
 */
export async function safeWrapAsync<DataType>(promise: () => Promise<DataType>): SafeWrapAsync<Error, DataType> {
  try {
    return [null, await promise()];
  } catch (error) {
    return [toError(error), null];
  }
}

/**
 * Synchronous variant of {@link safeWrapAsync}.
 */
export function safeWrap<DataType>(fn: () => DataType): SafeWrap<Error, DataType> {
  try {
    return [null, fn()];
  } catch (error) {
    return [toError(error), null];
  }
}
