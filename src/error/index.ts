/**
 * Error entrypoint: exports the error taxonomy and helpers for identifying and unwrapping error types.
 * Use this when you only need error utilities without the client.
 * @module
 */

/** Error thrown when the client is constructed with missing or invalid settings. */
export { ConfigurationError, getConfigurationError, isConfigurationError } from './configurationError.js';
/** Error returned when a successful response body is not valid JSON. */
export { DecodeError, getDecodeError, isDecodeError } from './decodeError.js';
/** Error representing a non-2xx HTTP response, attached as cause. */
export { getHttpError, HTTPError, isHttpError } from './httpError.js';
/** Generic check that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Error raised when a request exceeds the configured timeout, attached as cause. */
export { getTimeoutError, isTimeoutError, TimeoutError } from './timeoutError.js';
/** Umbrella error for every failed call. */
export { getTwitchAPIError, isTwitchAPIError, TwitchAPIError, type TwitchAPIErrorOptions } from './twitchApiError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
/** Error returned when call parameters fail validation. */
export { describeIssues, getValidationError, isValidationError, ValidationError } from './validationError.js';
