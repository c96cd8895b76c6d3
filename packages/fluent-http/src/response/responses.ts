import { ok, err } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { z } from 'zod';
import { createDownloadProgress } from '../progress/download-progress.js';
import type {
  ByteResponse,
  ProgressByteResponse,
  ResponseParseError,
  StringResponse,
} from './types.js';

const parseJson = (text: string): Result<unknown, ResponseParseError> => {
  try {
    const value: unknown = JSON.parse(text);
    return ok(value);
  } catch (error) {
    return err({
      type: 'invalid-json',
      message: 'Response body is not valid JSON',
      cause: error,
    });
  }
};

/**
 * Creates a text response.
 *
 * @example
 * ```typescript
 * const user = createStringResponse('{"id":1}').parse(z.object({ id: z.number() }));
 * if (user.isOk()) {
 *   console.log(user.value.id); // 1
 * }
 * ```
 */
export const createStringResponse = (rawResponse: string): StringResponse => {
  const parse = <T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Result<T, ResponseParseError> =>
    parseJson(rawResponse).andThen((value): Result<T, ResponseParseError> => {
      const parsed = schema.safeParse(value);
      if (!parsed.success) {
        return err({
          type: 'schema-mismatch',
          message: parsed.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; '),
          cause: parsed.error,
        });
      }
      return ok(parsed.data);
    });

  return {
    rawResponse,
    json: () => parseJson(rawResponse),
    parse,
  };
};

/**
 * Creates a byte response.
 */
export const createByteResponse = (rawResponse: Uint8Array): ByteResponse => ({ rawResponse });

/**
 * Creates a byte response with download size information.
 * `downloadedBytes` is taken from the body itself, never from a reported header.
 *
 * @param rawResponse - Buffered body
 * @param totalBytes - Total from the last progress snapshot, 0 if none was taken
 */
export const createProgressByteResponse = (
  rawResponse: Uint8Array,
  totalBytes: number
): ProgressByteResponse => {
  const downloadedBytes = rawResponse.byteLength;
  return {
    rawResponse,
    totalBytes,
    downloadedBytes,
    progress: createDownloadProgress(downloadedBytes, totalBytes),
  };
};
