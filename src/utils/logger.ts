/**
 * Level-filtered diagnostic logger. Silent unless a level is configured.
 * @internal
 */

/** Verbosity accepted by the client's `logLevel` option. */
export type LogLevel = 'none' | 'info' | 'debug' | 'trace';

const LEVEL_RANK: Record<LogLevel, number> = {
  none: 0,
  info: 1,
  debug: 2,
  trace: 3,
};

/** Keys whose values never reach the console, compared case-insensitively. */
const REDACTED_KEYS = new Set(['x-rapidapi-key', 'apikey']);

/**
 * Logger scoped to one client instance, writing through `console`.
 * @internal
 */
export class Logger {
  #level: LogLevel;

  constructor(level: LogLevel = 'none') {
    this.#level = level;
  }

  get level(): LogLevel {
    return this.#level;
  }

  info(message: string, data?: unknown): void {
    this.#write('info', message, data);
  }

  debug(message: string, data?: unknown): void {
    this.#write('debug', message, data);
  }

  trace(message: string, data?: unknown): void {
    this.#write('trace', message, data);
  }

  /**
   * Replaces credentials with a marker, recursing through arrays, plain objects and `Headers`.
   */
  static sanitize(data: unknown, seen = new WeakSet<object>()): unknown {
    if (data === null || typeof data !== 'object') {
      return data;
    }

    if (seen.has(data)) {
      return '[Circular]';
    }
    seen.add(data);

    if (data instanceof Headers) {
      return Logger.sanitize(Object.fromEntries(data.entries()), seen);
    }

    if (data instanceof Error) {
      return { name: data.name, message: data.message };
    }

    if (Array.isArray(data)) {
      return data.map((item) => Logger.sanitize(item, seen));
    }

    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      sanitized[key] = REDACTED_KEYS.has(key.toLowerCase()) ? '[REDACTED]' : Logger.sanitize(value, seen);
    }

    return sanitized;
  }

  #write(level: Exclude<LogLevel, 'none'>, message: string, data?: unknown): void {
    if (LEVEL_RANK[level] > LEVEL_RANK[this.#level]) {
      return;
    }

    const tag = `[${level.toUpperCase()}]`;
    // INFO stays short, DEBUG/TRACE carry a timestamp
    const prefix = level === 'info' ? tag : `${tag} [${new Date().toISOString()}]`;

    if (data === undefined) {
      console.log(`${prefix} ${message}`);
      return;
    }

    console.log(`${prefix} ${message}`, Logger.sanitize(data));
  }
}
