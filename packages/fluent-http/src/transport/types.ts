/**
 * HTTP methods the builder can dispatch.
 */
export type HttpMethod = 'GET' | 'POST';

/**
 * Named method values, for callers that prefer `HttpMethod.Post` over a string literal.
 */
export const HttpMethod = {
  Get: 'GET',
  Post: 'POST',
} as const satisfies Record<string, HttpMethod>;

/**
 * Terminal (or pending) state of a transport operation.
 */
export type TransportOutcome =
  | 'in-progress'
  | 'success'
  | 'connection-error'
  | 'protocol-error'
  | 'data-processing-error';

/**
 * Request handed to the transport.
 */
export interface TransportRequest {
  readonly method: HttpMethod;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  /** UTF-8 encoded payload; omitted when there is nothing to upload */
  readonly body?: Uint8Array;
  readonly timeoutMs: number;
}

/**
 * Handle on a started transport operation.
 * All readers may be called at any time; before completion they report what is known so far.
 */
export interface TransportOperation {
  /** Settles (never rejects) once the operation reaches a terminal outcome */
  readonly done: Promise<void>;
  readonly isDone: () => boolean;
  readonly outcome: () => TransportOutcome;
  /** Response status code; 0 when no response was received */
  readonly status: () => number;
  /** Buffered response body */
  readonly data: () => Uint8Array;
  /** Buffered response body decoded as UTF-8 */
  readonly text: () => string;
  /** Reads a response header by case-insensitive name */
  readonly getResponseHeader: (name: string) => string | undefined;
  /** Response bytes received so far */
  readonly downloadedBytes: () => number;
  /** Transport-level failure description, when the outcome is an error */
  readonly errorMessage: () => string | undefined;
  /** Whether the operation was ended by its own timeout */
  readonly timedOut: () => boolean;
  /** Aborts the operation; a no-op once it is done */
  readonly abort: () => void;
}

/**
 * Host networking primitive wrapped by the dispatcher.
 * `send` must not throw: every failure is reported through the operation's outcome.
 */
export interface Transport {
  readonly send: (request: TransportRequest) => TransportOperation;
}
