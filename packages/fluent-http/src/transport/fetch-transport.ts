import { MAX_TIMEOUT_MS } from '../config/engine-config.js';
import type {
  Transport,
  TransportOperation,
  TransportOutcome,
  TransportRequest,
} from './types.js';

/**
 * Options for the fetch-backed transport.
 */
export interface FetchTransportOptions {
  /** fetch implementation (default: global fetch) */
  readonly fetch?: typeof fetch;
}

const decoder = new TextDecoder('utf-8');

const concatChunks = (chunks: readonly Uint8Array[], length: number): Uint8Array => {
  const result = new Uint8Array(length);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return result;
};

/**
 * Creates a transport on top of the fetch API.
 *
 * The response body is read chunk by chunk so `downloadedBytes()` can be polled
 * while the download is running. Statuses of 400 and above are reported as
 * `protocol-error`; failures before a response (including aborts and timeouts)
 * as `connection-error`; failures while reading the body as `data-processing-error`.
 *
 * @example
 * ```typescript
 * const transport = createFetchTransport();
 * const operation = transport.send({ method: 'GET', url, headers: {}, timeoutMs: 5000 });
 * await operation.done;
 * operation.outcome(); // 'success'
 * ```
 */
export const createFetchTransport = (options: FetchTransportOptions = {}): Transport => {
  const fetchImpl = options.fetch ?? fetch;

  const send = (request: TransportRequest): TransportOperation => {
    const controller = new AbortController();
    const chunks: Uint8Array[] = [];
    let downloaded = 0;
    let outcome: TransportOutcome = 'in-progress';
    let status = 0;
    let responseHeaders: Headers | undefined;
    let failure: string | undefined;
    let timedOut = false;
    let buffered: Uint8Array | undefined;

    const timeoutMs = Math.min(request.timeoutMs, MAX_TIMEOUT_MS);
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    const execute = async (): Promise<void> => {
      try {
        const init: RequestInit = {
          method: request.method,
          headers: { ...request.headers },
          signal: controller.signal,
        };

        // Only set body if provided (exactOptionalPropertyTypes compliance)
        if (request.body !== undefined) {
          init.body = request.body;
        }

        const response = await fetchImpl(request.url, init);
        status = response.status;
        responseHeaders = response.headers;

        if (response.body !== null) {
          const reader = response.body.getReader();
          for (;;) {
            const chunk = await reader.read();
            if (chunk.done) {
              break;
            }
            chunks.push(chunk.value);
            downloaded += chunk.value.byteLength;
          }
        }

        outcome = status >= 400 ? 'protocol-error' : 'success';
      } catch (error) {
        if (timedOut) {
          failure = `Request timed out after ${String(timeoutMs)}ms`;
        } else if (controller.signal.aborted) {
          failure = 'Request aborted';
        } else {
          failure = error instanceof Error ? error.message : 'Network error';
        }
        outcome =
          responseHeaders !== undefined && !controller.signal.aborted
            ? 'data-processing-error'
            : 'connection-error';
      } finally {
        clearTimeout(timeoutId);
        buffered = concatChunks(chunks, downloaded);
      }
    };

    const done = execute();

    const data = (): Uint8Array => buffered ?? concatChunks(chunks, downloaded);

    return {
      done,
      isDone: () => outcome !== 'in-progress',
      outcome: () => outcome,
      status: () => status,
      data,
      text: () => decoder.decode(data()),
      getResponseHeader: (name) => responseHeaders?.get(name) ?? undefined,
      downloadedBytes: () => downloaded,
      errorMessage: () => failure,
      timedOut: () => timedOut,
      abort: () => {
        if (outcome === 'in-progress') {
          controller.abort();
        }
      },
    };
  };

  return { send };
};
