import type { Result } from 'neverthrow';
import type { HttpErrorHandler, RequestError } from '../errors/types.js';
import type { ProgressCallback } from '../progress/download-progress.js';
import type {
  ByteResponse,
  ProgressByteResponse,
  StringResponse,
} from '../response/types.js';
import type { BodyTransformer } from '../transformers/types.js';
import type { HttpMethod } from '../transport/types.js';

/**
 * Sends a configured request and produces one output shape.
 */
export interface OutputHandler<T> {
  /**
   * Dispatches the request using the builder's state at the time of the call.
   *
   * Throws synchronously, without dispatching, when the method is not supported
   * or the transformer throws; every network-level failure is returned as an Err.
   */
  readonly send: () => Promise<Result<T, RequestError>>;
}

/**
 * Copy of a request's configuration, taken when it is sent.
 */
export interface RequestSnapshot {
  readonly url: string;
  readonly method: HttpMethod;
  readonly body: unknown;
  readonly transformer: BodyTransformer | undefined;
  readonly errorHandler: HttpErrorHandler | undefined;
  readonly timeoutSeconds: number;
  readonly signal: AbortSignal | undefined;
  readonly onProgress: ProgressCallback | undefined;
  /** Engine defaults merged with the request's own headers */
  readonly headers: Readonly<Record<string, string>>;
}

/**
 * Mutable, chainable request configuration.
 *
 * @example
 * ```typescript
 * const result = await engine
 *   .make('https://api.example.com/items')
 *   .setMethod('POST')
 *   .setHeader('Content-Type', 'application/json')
 *   .setTransformer(jsonTransformer)
 *   .setBody({ id: 1 })
 *   .setTimeout(10)
 *   .send();
 * ```
 */
export interface RequestBuilder {
  readonly url: string;
  readonly method: HttpMethod;
  readonly body: unknown;
  readonly timeoutSeconds: number;
  /** Headers set on this request only */
  readonly headers: Readonly<Record<string, string>>;

  readonly setMethod: (method: HttpMethod) => RequestBuilder;

  /**
   * Adds a request header.
   * @throws DuplicateHeaderError if the name was already set on this request
   */
  readonly setHeader: (key: string, value: string) => RequestBuilder;

  /** Timeout in seconds; 0 selects the engine default */
  readonly setTimeout: (timeoutSeconds: number) => RequestBuilder;

  /** Aborting the signal cancels the request while it is in flight */
  readonly setCancellationSignal: (signal: AbortSignal) => RequestBuilder;

  readonly setTransformer: (transformer: BodyTransformer) => RequestBuilder;

  readonly setBody: (body: unknown) => RequestBuilder;

  readonly setErrorHandler: (errorHandler: HttpErrorHandler) => RequestBuilder;

  /** Receives snapshots when the request is sent through `setProgressByteOutput()` */
  readonly setProgressCallback: (callback: ProgressCallback) => RequestBuilder;

  /** Engine defaults overlaid with this request's headers */
  readonly getAllHeaders: () => Record<string, string>;

  readonly snapshot: () => RequestSnapshot;

  readonly setStringOutput: () => OutputHandler<StringResponse>;
  readonly setByteOutput: () => OutputHandler<ByteResponse>;
  readonly setProgressByteOutput: () => OutputHandler<ProgressByteResponse>;

  /** Shorthand for `setStringOutput().send()` */
  readonly send: () => Promise<Result<StringResponse, RequestError>>;
}
