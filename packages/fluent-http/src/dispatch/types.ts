import type { Result } from 'neverthrow';
import type { HttpErrorHandler, RequestError } from '../errors/types.js';
import type { Logger } from '../logging/types.js';
import type { DownloadProgress, ProgressCallback } from '../progress/download-progress.js';
import type { HttpMethod, Transport } from '../transport/types.js';

/**
 * Everything the dispatcher needs to perform one request.
 */
export interface DispatchOptions {
  readonly method: HttpMethod;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  /** Timeout in seconds; 0 or undefined selects the dispatcher default */
  readonly timeoutSeconds?: number | undefined;
  /** Serialized body; sent as UTF-8 when non-empty */
  readonly payload?: string | undefined;
  readonly errorHandler?: HttpErrorHandler | undefined;
  /** Enables progress polling when set */
  readonly onProgress?: ProgressCallback | undefined;
  readonly signal?: AbortSignal | undefined;
}

/**
 * Buffered result of a successful dispatch.
 */
export interface DispatchSuccess {
  readonly status: number;
  readonly data: Uint8Array;
  /** Decodes the body as UTF-8 */
  readonly text: () => string;
  /** Last progress snapshot emitted, if progress was requested */
  readonly progress: DownloadProgress | undefined;
}

/**
 * Waits until the next scheduling opportunity.
 */
export type TickFn = () => Promise<void>;

/**
 * Collaborators of the dispatcher.
 */
export interface DispatcherConfig {
  readonly transport: Transport;
  readonly logger: Logger;
  readonly tick: TickFn;
  /** Timeout used when a request does not set one */
  readonly defaultTimeoutSeconds: number;
}

/**
 * Performs single requests and classifies their outcome.
 */
export interface Dispatcher {
  /**
   * Sends one request and waits for its terminal outcome.
   * @param options - The request to perform
   * @returns Result with the buffered response or the failure
   */
  readonly dispatch: (options: DispatchOptions) => Promise<Result<DispatchSuccess, RequestError>>;
}
