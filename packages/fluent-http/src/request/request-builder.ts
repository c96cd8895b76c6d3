import type { Dispatcher } from '../dispatch/types.js';
import { DuplicateHeaderError } from '../errors/errors.js';
import type { HttpErrorHandler } from '../errors/types.js';
import type { ProgressCallback } from '../progress/download-progress.js';
import type { BodyTransformer } from '../transformers/types.js';
import type { HttpMethod } from '../transport/types.js';
import {
  createByteOutputHandler,
  createProgressByteOutputHandler,
  createStringOutputHandler,
} from './output-handlers.js';
import type { RequestBuilder, RequestSnapshot } from './types.js';

/**
 * Collaborators handed to every request by its engine.
 */
export interface RequestDependencies {
  readonly dispatcher: Dispatcher;
  /** Reads the engine's current default headers */
  readonly defaultHeaders: () => Readonly<Record<string, string>>;
}

interface MutableRequestState {
  method: HttpMethod;
  body: unknown;
  transformer: BodyTransformer | undefined;
  errorHandler: HttpErrorHandler | undefined;
  timeoutSeconds: number;
  signal: AbortSignal | undefined;
  onProgress: ProgressCallback | undefined;
  readonly headers: Map<string, string>;
}

/**
 * Creates a request builder for a URL.
 * Usually obtained through `engine.make(url)`.
 *
 * Every setter mutates the builder and returns it. Output handlers read the
 * builder when they send, so a builder can be changed and sent again.
 */
export const createRequest = (url: string, dependencies: RequestDependencies): RequestBuilder => {
  const { dispatcher, defaultHeaders } = dependencies;

  const state: MutableRequestState = {
    method: 'GET',
    body: undefined,
    transformer: undefined,
    errorHandler: undefined,
    timeoutSeconds: 0,
    signal: undefined,
    onProgress: undefined,
    headers: new Map(),
  };

  // Header names are case-insensitive on the wire, so a request header
  // replaces any default spelled differently.
  const getAllHeaders = (): Record<string, string> => {
    const overridden = new Set([...state.headers.keys()].map((key) => key.toLowerCase()));
    const defaults = Object.entries(defaultHeaders()).filter(
      ([key]) => !overridden.has(key.toLowerCase())
    );
    return {
      ...Object.fromEntries(defaults),
      ...Object.fromEntries(state.headers),
    };
  };

  const snapshot = (): RequestSnapshot => ({
    url,
    method: state.method,
    body: state.body,
    transformer: state.transformer,
    errorHandler: state.errorHandler,
    timeoutSeconds: state.timeoutSeconds,
    signal: state.signal,
    onProgress: state.onProgress,
    headers: getAllHeaders(),
  });

  const builder: RequestBuilder = {
    url,
    get method(): HttpMethod {
      return state.method;
    },
    get body(): unknown {
      return state.body;
    },
    get timeoutSeconds(): number {
      return state.timeoutSeconds;
    },
    get headers(): Record<string, string> {
      return Object.fromEntries(state.headers);
    },

    setMethod: (method) => {
      state.method = method;
      return builder;
    },
    setHeader: (key, value) => {
      if (state.headers.has(key)) {
        throw new DuplicateHeaderError(key);
      }
      state.headers.set(key, value);
      return builder;
    },
    setTimeout: (timeoutSeconds) => {
      state.timeoutSeconds = timeoutSeconds;
      return builder;
    },
    setCancellationSignal: (signal) => {
      state.signal = signal;
      return builder;
    },
    setTransformer: (transformer) => {
      state.transformer = transformer;
      return builder;
    },
    setBody: (body) => {
      state.body = body;
      return builder;
    },
    setErrorHandler: (errorHandler) => {
      state.errorHandler = errorHandler;
      return builder;
    },
    setProgressCallback: (callback) => {
      state.onProgress = callback;
      return builder;
    },

    getAllHeaders,
    snapshot,

    setStringOutput: () => createStringOutputHandler(snapshot, dispatcher),
    setByteOutput: () => createByteOutputHandler(snapshot, dispatcher),
    setProgressByteOutput: () => createProgressByteOutputHandler(snapshot, dispatcher),
    send: () => createStringOutputHandler(snapshot, dispatcher).send(),
  };

  return builder;
};
