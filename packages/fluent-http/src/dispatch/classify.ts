import { ok, err } from 'neverthrow';
import type { Result } from 'neverthrow';
import { createDefaultFailure, createUnexpectedError } from '../errors/errors.js';
import type { ErrorContext, HttpErrorHandler, RequestError } from '../errors/types.js';
import type { DownloadProgress } from '../progress/download-progress.js';
import type { HttpMethod, TransportOperation } from '../transport/types.js';
import type { DispatchSuccess } from './types.js';

/**
 * Request details needed to classify a finished operation.
 */
export interface ClassifyContext {
  readonly url: string;
  readonly method: HttpMethod;
  readonly errorHandler?: HttpErrorHandler | undefined;
  readonly progress?: DownloadProgress | undefined;
}

/**
 * Maps the terminal state of a transport operation to a buffered result or a failure.
 * Failed outcomes go through the request's error handler when one is set.
 */
export const classifyOutcome = (
  operation: TransportOperation,
  context: ClassifyContext
): Result<DispatchSuccess, RequestError> => {
  const outcome = operation.outcome();

  switch (outcome) {
    case 'success':
      return ok({
        status: operation.status(),
        data: operation.data(),
        text: () => operation.text(),
        progress: context.progress,
      });
    case 'connection-error':
    case 'protocol-error':
    case 'data-processing-error': {
      const errorContext: ErrorContext = {
        url: context.url,
        method: context.method,
        outcome,
        status: operation.status(),
        content: operation.text(),
        data: operation.data(),
        errorMessage: operation.errorMessage(),
        timedOut: operation.timedOut(),
        getResponseHeader: (name) => operation.getResponseHeader(name),
      };
      return err(
        context.errorHandler !== undefined
          ? context.errorHandler.handleError(errorContext)
          : createDefaultFailure(errorContext)
      );
    }
    default:
      return err(createUnexpectedError(outcome));
  }
};
