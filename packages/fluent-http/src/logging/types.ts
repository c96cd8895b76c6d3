/**
 * Severity levels understood by the built-in loggers.
 * `silent` disables output entirely.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Minimal structured logger.
 * Any object with these four methods (pino, winston, console wrappers) can be injected.
 */
export interface Logger {
  readonly debug: (message: string, meta?: Readonly<Record<string, unknown>>) => void;
  readonly info: (message: string, meta?: Readonly<Record<string, unknown>>) => void;
  readonly warn: (message: string, meta?: Readonly<Record<string, unknown>>) => void;
  readonly error: (message: string, meta?: Readonly<Record<string, unknown>>) => void;
}

/**
 * Options for the console logger.
 */
export interface ConsoleLoggerOptions {
  /** Lowest level that is written (default: 'info') */
  readonly level?: LogLevel;
  /** Prefix placed in front of every line (default: '[fluent-http]') */
  readonly prefix?: string;
}
