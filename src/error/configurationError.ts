import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';
import { TwitchAPIError } from './twitchApiError.js';
import { unwrapErrorType } from './unwrapErrorType.js';
import { describeIssues } from './validationError.js';

/**
 * Error thrown while constructing a client with missing or invalid settings (e.g. an empty API key).
 */
export class ConfigurationError extends TwitchAPIError {
  /** ConfigurationError error-name */
  override name = 'ConfigurationError';
  /** Issues reported for the rejected settings */
  readonly issues: readonly StandardSchemaV1.Issue[];

  /** Creates a new ConfigurationError with the offending settings described by `issues` */
  constructor(message: string, issues: readonly StandardSchemaV1.Issue[] = [], opts?: ErrorOptions) {
    super(issues.length > 0 ? `${message}: ${describeIssues(issues)}` : message, opts);
    this.issues = issues;
  }
}

/**
 * Checks whether an error is, or wraps, a {@link ConfigurationError}.
 */
export function isConfigurationError(error: unknown): boolean {
  return isErrorType(ConfigurationError, error);
}

/**
 * Extract a {@link ConfigurationError} from an unknown error value, following nested causes.
 */
export function getConfigurationError(error: unknown): null | ConfigurationError {
  return unwrapErrorType(ConfigurationError, error);
}
