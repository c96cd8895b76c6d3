export { createConsoleLogger, createLoggerForLevel, silentLogger } from './logger.js';
export type { ConsoleLoggerOptions, LogLevel, Logger } from './types.js';
