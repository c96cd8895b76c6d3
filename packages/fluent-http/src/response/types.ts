import type { Result } from 'neverthrow';
import type { z } from 'zod';
import type { DownloadProgress } from '../progress/download-progress.js';

/**
 * Base shape of every response: the buffered body in its output form.
 */
export interface HttpResponse<T> {
  readonly rawResponse: T;
}

/**
 * Failure to bind a text response to a value.
 */
export interface ResponseParseError {
  readonly type: 'invalid-json' | 'schema-mismatch';
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Response whose body was decoded as UTF-8 text.
 */
export interface StringResponse extends HttpResponse<string> {
  /**
   * Parses the body as JSON without checking its shape.
   */
  readonly json: () => Result<unknown, ResponseParseError>;

  /**
   * Parses the body as JSON and validates it against a schema.
   * @param schema - zod schema describing the expected body
   */
  readonly parse: <T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ) => Result<T, ResponseParseError>;
}

/**
 * Response holding the raw body bytes.
 */
export type ByteResponse = HttpResponse<Uint8Array>;

/**
 * Byte response with the size information gathered while downloading.
 */
export interface ProgressByteResponse extends HttpResponse<Uint8Array> {
  /** Size announced by the server; 0 when unknown */
  readonly totalBytes: number;
  /** Bytes actually received; always the body length */
  readonly downloadedBytes: number;
  /** Final progress snapshot */
  readonly progress: DownloadProgress;
}
