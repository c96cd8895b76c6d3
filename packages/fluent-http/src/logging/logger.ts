import type { ConsoleLoggerOptions, LogLevel, Logger } from './types.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const DEFAULT_PREFIX = '[fluent-http]';

const noop = (): void => undefined;

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

/**
 * Creates a logger writing to stderr through `console.error`.
 * Stdout is left untouched so the library can run inside stdio-based tools.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger({ level: 'debug' });
 * logger.debug('dispatch started', { url: 'https://api.example.com' });
 * // [fluent-http] DEBUG dispatch started {"url":"https://api.example.com"}
 * ```
 */
export const createConsoleLogger = (options: ConsoleLoggerOptions = {}): Logger => {
  const { level = 'info', prefix = DEFAULT_PREFIX } = options;
  const threshold = LEVEL_ORDER[level];

  const write =
    (lineLevel: Exclude<LogLevel, 'silent'>) =>
    (message: string, meta?: Readonly<Record<string, unknown>>): void => {
      if (LEVEL_ORDER[lineLevel] < threshold) {
        return;
      }
      const line = `${prefix} ${lineLevel.toUpperCase()} ${message}`;
      if (meta === undefined) {
        console.error(line);
      } else {
        console.error(line, JSON.stringify(meta));
      }
    };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
};

/**
 * Resolves the logger for a configured level: silent stays silent,
 * everything else gets a console logger at that level.
 */
export const createLoggerForLevel = (level: LogLevel): Logger =>
  level === 'silent' ? silentLogger : createConsoleLogger({ level });
