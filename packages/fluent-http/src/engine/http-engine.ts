import { setTimeout as delay } from 'node:timers/promises';
import { resolveEngineConfig } from '../config/engine-config.js';
import { createDispatcher } from '../dispatch/dispatcher.js';
import { createLoggerForLevel } from '../logging/logger.js';
import { createRequest } from '../request/request-builder.js';
import type { RequestBuilder } from '../request/types.js';
import { createFetchTransport } from '../transport/fetch-transport.js';
import type { HttpEngine, HttpEngineOptions } from './types.js';

/**
 * Creates an HTTP engine.
 *
 * @param options - Configuration overrides and collaborators
 * @returns An HttpEngine instance
 * @throws Error if the resolved configuration is invalid
 *
 * @example
 * ```typescript
 * const engine = createHttpEngine({ timeoutSeconds: 10 });
 * engine.addHeader('Authorization', 'Bearer test-token');
 *
 * const result = await engine.make('https://api.example.com/status').send();
 * if (result.isOk()) {
 *   console.log(result.value.rawResponse);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export const createHttpEngine = (options: HttpEngineOptions = {}): HttpEngine => {
  const config = resolveEngineConfig(options, options.env);
  const defaultHeaders = new Map<string, string>(Object.entries(config.defaultHeaders));

  const dispatcher = createDispatcher({
    transport: options.transport ?? createFetchTransport(),
    logger: options.logger ?? createLoggerForLevel(config.logLevel),
    tick: options.tick ?? ((): Promise<void> => delay(config.progressTickMs)),
    defaultTimeoutSeconds: config.timeoutSeconds,
  });

  const getDefaultHeaders = (): Record<string, string> => Object.fromEntries(defaultHeaders);

  const make = (url: string): RequestBuilder =>
    createRequest(url, { dispatcher, defaultHeaders: getDefaultHeaders });

  const addHeader = (key: string, value: string): void => {
    defaultHeaders.set(key, value);
  };

  const removeHeader = (key: string): void => {
    defaultHeaders.delete(key);
  };

  return {
    config,
    make,
    addHeader,
    removeHeader,
    getDefaultHeaders,
  };
};
