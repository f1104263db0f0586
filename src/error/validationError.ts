import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';
import { TwitchAPIError, type TwitchAPIErrorOptions } from './twitchApiError.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Renders schema issues as `path: message` pairs, e.g. `channel: Required; username: Required`.
 */
export function describeIssues(issues: readonly StandardSchemaV1.Issue[]): string {
  return issues
    .map((issue) => {
      const path = (issue.path ?? []).map((segment) => String(typeof segment === 'object' ? segment.key : segment));
      return path.length > 0 ? `${path.join('.')}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

/**
 * Error raised when call parameters fail validation, before any request is sent.
 */
export class ValidationError extends TwitchAPIError {
  /** ValidationError error-name */
  override name = 'ValidationError';
  /** Schema validation issues */
  readonly issues: readonly StandardSchemaV1.Issue[];

  /** Creates a new ValidationError with the issues that caused it */
  constructor(message: string, issues: readonly StandardSchemaV1.Issue[] = [], opts?: TwitchAPIErrorOptions) {
    super(issues.length > 0 ? `${message}: ${describeIssues(issues)}` : message, opts);
    this.issues = issues;
  }
}

/**
 * Checks whether an error is, or wraps, a {@link ValidationError}.
 */
export function isValidationError(error: unknown): boolean {
  return isErrorType(ValidationError, error);
}

/**
 * Extract a {@link ValidationError} from an unknown error value, following nested causes.
 */
export function getValidationError(error: unknown): null | ValidationError {
  return unwrapErrorType(ValidationError, error);
}
