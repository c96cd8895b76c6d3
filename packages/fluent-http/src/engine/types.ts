import type { EngineConfig, EngineConfigOptions, EnvironmentSource } from '../config/engine-config.js';
import type { TickFn } from '../dispatch/types.js';
import type { Logger } from '../logging/types.js';
import type { RequestBuilder } from '../request/types.js';
import type { Transport } from '../transport/types.js';

/**
 * Options for creating an engine.
 */
export interface HttpEngineOptions extends EngineConfigOptions {
  /** Network transport (default: fetch-backed transport) */
  readonly transport?: Transport;
  /** Logger (default: console logger at the configured level) */
  readonly logger?: Logger;
  /** Wait between progress reads (default: timer of `progressTickMs`) */
  readonly tick?: TickFn;
  /** Environment to read configuration from (default: process.env) */
  readonly env?: EnvironmentSource;
}

/**
 * Factory for requests sharing a set of default headers.
 *
 * The default header map is read whenever a request resolves its headers.
 * Changing it while requests are being built or sent from other tasks is the
 * caller's responsibility.
 */
export interface HttpEngine {
  /** Resolved configuration */
  readonly config: EngineConfig;

  /**
   * Creates a request builder for the URL.
   * @param url - Target URL
   */
  readonly make: (url: string) => RequestBuilder;

  /**
   * Adds or replaces a default header sent with every request.
   */
  readonly addHeader: (key: string, value: string) => void;

  /**
   * Removes a default header. Removing an absent header does nothing.
   */
  readonly removeHeader: (key: string) => void;

  /** Copy of the current default headers */
  readonly getDefaultHeaders: () => Record<string, string>;
}
