import { err } from 'neverthrow';
import type { Result } from 'neverthrow';
import { MAX_TIMEOUT_MS } from '../config/engine-config.js';
import { createCancelledError } from '../errors/errors.js';
import type { RequestError } from '../errors/types.js';
import {
  createDownloadProgress,
  parseContentLength,
  type DownloadProgress,
  type ProgressCallback,
} from '../progress/download-progress.js';
import type { TransportOperation, TransportRequest } from '../transport/types.js';
import { classifyOutcome } from './classify.js';
import type {
  DispatchOptions,
  DispatchSuccess,
  Dispatcher,
  DispatcherConfig,
  TickFn,
} from './types.js';

const CONTENT_LENGTH_HEADER = 'Content-Length';

const encoder = new TextEncoder();

interface ProgressEmitter {
  readonly emit: (bytesDownloaded: number) => DownloadProgress;
}

/**
 * Emits non-decreasing progress snapshots for one operation.
 */
const createProgressEmitter = (
  operation: TransportOperation,
  onProgress: ProgressCallback
): ProgressEmitter => {
  let last: DownloadProgress | undefined;

  const emit = (bytesDownloaded: number): DownloadProgress => {
    const totalBytes = parseContentLength(operation.getResponseHeader(CONTENT_LENGTH_HEADER));
    const snapshot = createDownloadProgress(
      Math.max(bytesDownloaded, last?.bytesDownloaded ?? 0),
      totalBytes
    );
    last = snapshot;
    onProgress(snapshot);
    return snapshot;
  };

  return { emit };
};

/**
 * Reads progress once per tick until the operation finishes.
 */
const pollUntilDone = async (
  operation: TransportOperation,
  emit: (bytesDownloaded: number) => DownloadProgress,
  tick: TickFn
): Promise<void> => {
  while (!operation.isDone()) {
    emit(operation.downloadedBytes());
    await Promise.race([operation.done, tick()]);
  }
};

/**
 * Creates a dispatcher over the given transport.
 *
 * A dispatch moves from in-flight to exactly one of succeeded, failed or cancelled.
 * Cancellation wins over whatever the transport reports once the caller's signal
 * has fired; transport timeouts are failures, not cancellations.
 *
 * @example
 * ```typescript
 * const dispatcher = createDispatcher({
 *   transport: createFetchTransport(),
 *   logger: silentLogger,
 *   tick: () => setTimeout(16),
 *   defaultTimeoutSeconds: 30,
 * });
 * const result = await dispatcher.dispatch({ method: 'GET', url, headers: {} });
 * ```
 */
export const createDispatcher = (config: DispatcherConfig): Dispatcher => {
  const { transport, logger, tick, defaultTimeoutSeconds } = config;

  const buildTransportRequest = (options: DispatchOptions): TransportRequest => {
    const timeoutSeconds =
      options.timeoutSeconds !== undefined &&
      Number.isFinite(options.timeoutSeconds) &&
      options.timeoutSeconds > 0
        ? options.timeoutSeconds
        : defaultTimeoutSeconds;

    const request: TransportRequest = {
      method: options.method,
      url: options.url,
      headers: { ...options.headers },
      // Longer delays overflow the timer and fire immediately
      timeoutMs: Math.min(timeoutSeconds * 1000, MAX_TIMEOUT_MS),
    };

    if (options.payload !== undefined && options.payload.length > 0) {
      return { ...request, body: encoder.encode(options.payload) };
    }

    return request;
  };

  const dispatch = async (
    options: DispatchOptions
  ): Promise<Result<DispatchSuccess, RequestError>> => {
    const { url, method, signal, onProgress } = options;
    const request = buildTransportRequest(options);

    logger.debug('Dispatching request', {
      method,
      url,
      timeoutMs: request.timeoutMs,
      hasPayload: request.body !== undefined,
    });

    const operation = transport.send(request);
    const abortOperation = (): void => {
      operation.abort();
    };

    if (signal !== undefined) {
      if (signal.aborted) {
        operation.abort();
      } else {
        signal.addEventListener('abort', abortOperation, { once: true });
      }
    }

    const emitter =
      onProgress !== undefined ? createProgressEmitter(operation, onProgress) : undefined;

    try {
      if (emitter !== undefined) {
        await pollUntilDone(operation, emitter.emit, tick);
      } else {
        await operation.done;
      }
    } catch (error) {
      // A throwing progress callback must not leave the download running
      operation.abort();
      throw error;
    } finally {
      signal?.removeEventListener('abort', abortOperation);
    }

    if (signal?.aborted === true) {
      logger.info('Request cancelled', { method, url });
      return err(createCancelledError(url));
    }

    const progress =
      emitter !== undefined && operation.outcome() === 'success'
        ? emitter.emit(operation.data().byteLength)
        : undefined;

    const result = classifyOutcome(operation, {
      url,
      method,
      errorHandler: options.errorHandler,
      progress,
    });

    if (result.isErr()) {
      logger.warn('Request failed', {
        method,
        url,
        type: result.error.type,
        message: result.error.message,
      });
    } else {
      logger.debug('Request completed', {
        method,
        url,
        status: result.value.status,
        bytes: result.value.data.byteLength,
      });
    }

    return result;
  };

  return { dispatch };
};
