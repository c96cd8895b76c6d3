/**
 * fluent-http - fluent builder for single HTTP requests with progress and cancellation
 *
 * @packageDocumentation
 */

// ============================================================================
// CORE: Engine and Requests
// ============================================================================

export { createHttpEngine } from './engine/index.js';
export type { HttpEngine, HttpEngineOptions } from './engine/index.js';

export { createRequest } from './request/index.js';
export type {
  OutputHandler,
  RequestBuilder,
  RequestSnapshot,
  RequestDependencies,
} from './request/index.js';

export { HttpMethod } from './transport/index.js';

// ============================================================================
// CORE: Responses
// ============================================================================

export {
  createStringResponse,
  createByteResponse,
  createProgressByteResponse,
} from './response/index.js';
export type {
  HttpResponse,
  StringResponse,
  ByteResponse,
  ProgressByteResponse,
  ResponseParseError,
} from './response/index.js';

export { createDownloadProgress, parseContentLength } from './progress/index.js';
export type { DownloadProgress, ProgressCallback } from './progress/index.js';

// ============================================================================
// CORE: Errors
// ============================================================================

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
} from './errors/index.js';
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
} from './errors/index.js';

// ============================================================================
// CORE: Body Transformers
// ============================================================================

export {
  jsonTransformer,
  formEncodedTransformer,
  createFormEncodedTransformer,
  toDictionary,
} from './transformers/index.js';
export type { BodyTransformer, DictionaryOptions, FormEncodedOptions } from './transformers/index.js';

// ============================================================================
// ADVANCED: Configuration and Logging
// ============================================================================

export {
  resolveEngineConfig,
  DEFAULT_TIMEOUT_SECONDS,
  DEFAULT_PROGRESS_TICK_MS,
  MAX_TIMEOUT_MS,
  MAX_TIMEOUT_SECONDS,
  ENV_TIMEOUT_SECONDS,
  ENV_PROGRESS_TICK_MS,
  ENV_LOG_LEVEL,
} from './config/index.js';
export type { EngineConfig, EngineConfigOptions, EnvironmentSource } from './config/index.js';

export { createConsoleLogger, silentLogger } from './logging/index.js';
export type { ConsoleLoggerOptions, LogLevel, Logger } from './logging/index.js';

// ============================================================================
// ADVANCED: Custom Transports and Dispatch
// ============================================================================

export { createFetchTransport } from './transport/index.js';
export type {
  FetchTransportOptions,
  Transport,
  TransportOperation,
  TransportOutcome,
  TransportRequest,
} from './transport/index.js';

export { createDispatcher, classifyOutcome } from './dispatch/index.js';
export type {
  DispatchOptions,
  DispatchSuccess,
  Dispatcher,
  DispatcherConfig,
  TickFn,
} from './dispatch/index.js';
