import { z } from 'zod';
import { ConfigurationError } from '../error/configurationError.js';
import { mergeHeaderOptions } from '../fetch/utils.js';
import type { HeaderOptions } from '../types/request.js';
import type { LogLevel } from '../utils/logger.js';
import { validateSync } from '../utils/validator.js';
import { safeWrap } from '../utils/wrap.js';
import {
  API_KEY_HEADER,
  DEFAULT_TIMEOUT,
  GATEWAY_BASE_URL,
  GATEWAY_HOST,
  HOST_HEADER,
  MAX_TIMEOUT,
} from './constants.js';

/** Settings accepted when creating a client. */
export interface ClientConfigProps {
  /** RapidAPI key for the Twitch gateway (required, non-empty). */
  apiKey: string;
  /**
   * Request timeout in milliseconds, covering the response body as well as the headers.
   * @default 30000
   */
  timeout?: number;
  /**
   * Extra headers sent with every request (e.g. `User-Agent`).
   * They can never replace the API key and host headers.
   */
  headers?: HeaderOptions;
  /**
   * Diagnostic logging verbosity. The API key is always redacted.
   * @default 'none'
   */
  logLevel?: LogLevel;
}

/** Resolved, frozen configuration owned by one dispatcher. */
export interface ClientConfig {
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly host: string;
  /** Headers sent with every request, keyed by lower-cased name. */
  readonly headers: Readonly<Record<string, string>>;
  readonly timeout: number;
  readonly logLevel: LogLevel;
}

const clientConfigSchema = z.object({
  apiKey: z
    .string({ required_error: 'API key is required', invalid_type_error: 'API key must be a string' })
    .trim()
    .min(1, 'API key is required')
    .regex(/^[\x21-\x7e]*$/, 'API key must only contain printable ASCII characters'),
  timeout: z
    .number({ invalid_type_error: 'timeout must be a number of milliseconds' })
    .finite()
    .positive('timeout must be positive')
    .max(MAX_TIMEOUT, `timeout must not exceed ${MAX_TIMEOUT}ms`)
    .default(DEFAULT_TIMEOUT),
  logLevel: z.enum(['none', 'info', 'debug', 'trace']).default('none'),
});

/**
 * Validates client settings and resolves them into a frozen {@link ClientConfig}.
 *
 * @throws {ConfigurationError} when the API key is missing, empty or not sendable as a header, the timeout is out
 *   of range, or an extra header is invalid.
 */
export function createClientConfig(props: ClientConfigProps): ClientConfig {
  const [err, parsed] = validateSync(props, clientConfigSchema, 'error creating client config');
  if (err) {
    throw new ConfigurationError('error creating client config', err.issues, { cause: err });
  }

  const [errHeaders, headers] = safeWrap(() =>
    mergeHeaderOptions(
      props.headers,
      { Accept: 'application/json' },
      { [API_KEY_HEADER]: parsed.apiKey, [HOST_HEADER]: GATEWAY_HOST },
    ),
  );
  if (errHeaders) {
    throw new ConfigurationError(
      'error creating client config',
      [{ message: 'headers must be valid HTTP header names and values', path: ['headers'] }],
      { cause: errHeaders },
    );
  }

  return Object.freeze({
    apiKey: parsed.apiKey,
    baseUrl: GATEWAY_BASE_URL,
    host: GATEWAY_HOST,
    headers: Object.freeze(Object.fromEntries(headers.entries())),
    timeout: parsed.timeout,
    logLevel: parsed.logLevel,
  });
}
