/** Constructor of any error class, used to match instances while walking a `cause` chain. */
export type ErrorClass<T extends Error> = new (...args: never[]) => T;

/**
 * Walks an error and its nested `cause` chain and returns the first entry that is an
 * instance of `errorClass`. Returns `null` when nothing matches or `err` is not an error.
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): T | null {
  const seen = new Set<Error>();
  let current: unknown = err;

  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof errorClass) {
      return current;
    }

    seen.add(current);
    current = current.cause;
  }

  return null;
}
