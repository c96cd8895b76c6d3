import type {
  CancelledError,
  ErrorContext,
  HttpStatusError,
  NetworkError,
  ParseError,
  RequestError,
  UnexpectedError,
} from './types.js';

/**
 * Thrown when a request is sent with a method no output handler supports.
 * This is a programming error: it is never returned as a {@link RequestError}.
 */
export class InvalidMethodError extends Error {
  readonly method: string;

  constructor(method: string) {
    super(`Invalid HTTP method: ${method}`);
    this.name = 'InvalidMethodError';
    this.method = method;
  }
}

/**
 * Thrown when `setHeader` is called twice with the same name on one request.
 */
export class DuplicateHeaderError extends Error {
  readonly key: string;

  constructor(key: string) {
    super(`Header "${key}" has already been set on this request`);
    this.name = 'DuplicateHeaderError';
    this.key = key;
  }
}

/**
 * Creates the failure for a response with an error status.
 *
 * @param status - Response status code
 * @param content - Raw response body text
 * @returns An HttpStatusError
 */
export const createHttpStatusError = (status: number, content: string): HttpStatusError => ({
  type: 'http',
  message: `Request failed with status code ${String(status)}. Response: ${content}`,
  status,
  content,
});

/**
 * Creates the failure for a connection that failed or timed out.
 *
 * @param message - Transport failure description
 * @param timedOut - Whether the transport timeout ended the request
 * @param status - Response status code, 0 when none was received
 * @param content - Raw response body text received so far
 * @returns A NetworkError
 */
export const createNetworkError = (
  message: string,
  timedOut: boolean,
  status = 0,
  content = ''
): NetworkError => ({
  type: 'network',
  message,
  timedOut,
  status,
  content,
});

/**
 * Creates the failure for a response body that could not be processed.
 */
export const createParseError = (message: string, status: number, content: string): ParseError => ({
  type: 'parse',
  message,
  status,
  content,
});

/**
 * Creates the failure reported when the caller cancels an in-flight request.
 */
export const createCancelledError = (url: string): CancelledError => ({
  type: 'cancelled',
  message: `Request to ${url} was canceled.`,
  url,
});

/**
 * Creates the failure for a transport state outside the known outcomes.
 */
export const createUnexpectedError = (outcome: string): UnexpectedError => ({
  type: 'unexpected',
  message: `Unexpected transport result: ${outcome}`,
  outcome,
});

/**
 * Default classification of a failed transport operation,
 * used when the request has no error handler.
 */
export const createDefaultFailure = (context: ErrorContext): RequestError => {
  switch (context.outcome) {
    case 'protocol-error':
      return createHttpStatusError(context.status, context.content);
    case 'connection-error':
      return createNetworkError(
        context.errorMessage ?? `Connection to ${context.url} failed`,
        context.timedOut,
        context.status,
        context.content
      );
    case 'data-processing-error':
      return createParseError(
        context.errorMessage ?? 'Failed to process response data',
        context.status,
        context.content
      );
  }
};

/**
 * Type guard for cancellation failures.
 */
export const isCancelledError = (error: RequestError): error is CancelledError =>
  error.type === 'cancelled';
