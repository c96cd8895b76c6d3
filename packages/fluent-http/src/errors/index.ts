export {
  InvalidMethodError,
  DuplicateHeaderError,
  createHttpStatusError,
  createNetworkError,
  createParseError,
  createCancelledError,
  createUnexpectedError,
  createDefaultFailure,
  isCancelledError,
} from './errors.js';
export type {
  FailureOutcome,
  HttpStatusError,
  NetworkError,
  ParseError,
  CancelledError,
  UnexpectedError,
  CustomError,
  RequestError,
  ErrorContext,
  HttpErrorHandler,
} from './types.js';
