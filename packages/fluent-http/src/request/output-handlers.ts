import type { Result } from 'neverthrow';
import type { DispatchOptions, DispatchSuccess, Dispatcher } from '../dispatch/types.js';
import { InvalidMethodError } from '../errors/errors.js';
import type { RequestError } from '../errors/types.js';
import type { ProgressCallback } from '../progress/download-progress.js';
import {
  createByteResponse,
  createProgressByteResponse,
  createStringResponse,
} from '../response/responses.js';
import type {
  ByteResponse,
  ProgressByteResponse,
  StringResponse,
} from '../response/types.js';
import type { OutputHandler, RequestSnapshot } from './types.js';

/**
 * Selects the payload for the request's method.
 * GET never sends a body; POST sends whatever the transformer produces.
 */
const resolvePayload = (request: RequestSnapshot): string | undefined => {
  switch (request.method) {
    case 'GET':
      return undefined;
    case 'POST':
      return request.transformer?.(request.body);
    default: {
      const unsupported: never = request.method;
      throw new InvalidMethodError(String(unsupported));
    }
  }
};

const toDispatchOptions = (
  request: RequestSnapshot,
  onProgress?: ProgressCallback
): DispatchOptions => ({
  method: request.method,
  url: request.url,
  headers: request.headers,
  timeoutSeconds: request.timeoutSeconds,
  payload: resolvePayload(request),
  errorHandler: request.errorHandler,
  onProgress,
  signal: request.signal,
});

/**
 * Creates a handler returning the body as text.
 */
export const createStringOutputHandler = (
  readRequest: () => RequestSnapshot,
  dispatcher: Dispatcher
): OutputHandler<StringResponse> => ({
  send: (): Promise<Result<StringResponse, RequestError>> =>
    dispatcher
      .dispatch(toDispatchOptions(readRequest()))
      .then((result) => result.map((success) => createStringResponse(success.text()))),
});

/**
 * Creates a handler returning the body as bytes.
 */
export const createByteOutputHandler = (
  readRequest: () => RequestSnapshot,
  dispatcher: Dispatcher
): OutputHandler<ByteResponse> => ({
  send: (): Promise<Result<ByteResponse, RequestError>> =>
    dispatcher
      .dispatch(toDispatchOptions(readRequest()))
      .then((result) => result.map((success) => createByteResponse(success.data))),
});

/**
 * Creates a handler returning the body as bytes while reporting download progress
 * to the request's progress callback.
 */
export const createProgressByteOutputHandler = (
  readRequest: () => RequestSnapshot,
  dispatcher: Dispatcher
): OutputHandler<ProgressByteResponse> => ({
  send: (): Promise<Result<ProgressByteResponse, RequestError>> => {
    const request = readRequest();
    const onProgress: ProgressCallback = (progress) => {
      request.onProgress?.(progress);
    };

    return dispatcher
      .dispatch(toDispatchOptions(request, onProgress))
      .then((result) =>
        result.map((success: DispatchSuccess) =>
          createProgressByteResponse(success.data, success.progress?.totalBytes ?? 0)
        )
      );
  },
});
