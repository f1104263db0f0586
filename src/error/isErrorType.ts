import { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';

/**
 * Checks whether `err`, or anything in its `cause` chain, is an instance of `errorClass`.
 */
export function isErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): boolean {
  return unwrapErrorType(errorClass, err) !== null;
}
