import type { HttpMethod } from '../transport/types.js';

/**
 * Transport outcomes that are classified as failures.
 */
export type FailureOutcome = 'connection-error' | 'protocol-error' | 'data-processing-error';

/**
 * Fields shared by failures that carry response data.
 */
interface ResponseFailureBase {
  readonly message: string;
  /** Response status code; 0 when no response was received */
  readonly status: number;
  /** Raw response body text */
  readonly content: string;
}

/**
 * The server answered with a status of 400 or above.
 */
export interface HttpStatusError extends ResponseFailureBase {
  readonly type: 'http';
}

/**
 * The connection failed, was aborted by the transport or timed out.
 */
export interface NetworkError extends ResponseFailureBase {
  readonly type: 'network';
  readonly timedOut: boolean;
}

/**
 * The response started but its body could not be processed.
 */
export interface ParseError extends ResponseFailureBase {
  readonly type: 'parse';
}

/**
 * The caller's cancellation signal fired while the request was in flight.
 */
export interface CancelledError {
  readonly type: 'cancelled';
  readonly message: string;
  readonly url: string;
}

/**
 * The transport finished in a state the dispatcher does not know.
 */
export interface UnexpectedError {
  readonly type: 'unexpected';
  readonly message: string;
  readonly outcome: string;
}

/**
 * Failure built by a caller-supplied {@link HttpErrorHandler}.
 */
export interface CustomError {
  readonly type: 'custom';
  readonly message: string;
  readonly status?: number;
  readonly details?: unknown;
}

/**
 * Every failure a dispatch can end with.
 */
export type RequestError =
  | HttpStatusError
  | NetworkError
  | ParseError
  | CancelledError
  | UnexpectedError
  | CustomError;

/**
 * Everything known about a failed transport operation.
 */
export interface ErrorContext {
  readonly url: string;
  readonly method: HttpMethod;
  readonly outcome: FailureOutcome;
  readonly status: number;
  /** Raw response body text */
  readonly content: string;
  /** Raw response body bytes */
  readonly data: Uint8Array;
  /** Transport-level failure description, if any */
  readonly errorMessage: string | undefined;
  readonly timedOut: boolean;
  readonly getResponseHeader: (name: string) => string | undefined;
}

/**
 * Builds the failure returned for a failed transport operation.
 * Replaces the default classification when set on a request.
 *
 * @example
 * ```typescript
 * const apiErrors: HttpErrorHandler = {
 *   handleError: (context) => ({
 *     type: 'custom',
 *     message: `API rejected ${context.url}`,
 *     status: context.status,
 *     details: context.content,
 *   }),
 * };
 * ```
 */
export interface HttpErrorHandler {
  readonly handleError: (context: ErrorContext) => RequestError;
}
