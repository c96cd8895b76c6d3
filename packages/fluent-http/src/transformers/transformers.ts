import { toDictionary } from './dictionary.js';
import type { BodyTransformer, FormEncodedOptions } from './types.js';

/**
 * Serializes the body with JSON.stringify. An undefined body sends no payload.
 */
export const jsonTransformer: BodyTransformer = (body) =>
  body === undefined ? undefined : JSON.stringify(body);

/**
 * Creates a transformer producing `key1=value1&key2=value2` from an object's fields.
 *
 * @param options - Field renames and optional percent-encoding
 * @returns A body transformer
 * @throws TypeError when the body is null, undefined or not an object
 *
 * @example
 * ```typescript
 * const request = engine
 *   .make('https://api.example.com/login')
 *   .setMethod('POST')
 *   .setHeader('Content-Type', 'application/x-www-form-urlencoded')
 *   .setTransformer(createFormEncodedTransformer({ encode: true }))
 *   .setBody({ user: 'ada', note: 'a&b' });
 * // payload: user=ada&note=a%26b
 * ```
 */
export const createFormEncodedTransformer = (options: FormEncodedOptions = {}): BodyTransformer => {
  const { encode = false } = options;
  const escape = encode ? encodeURIComponent : (part: string): string => part;

  return (body) => {
    if (typeof body !== 'object' || body === null) {
      throw new TypeError('Form-encoded body must be a non-null object');
    }

    return Object.entries(toDictionary(body, options))
      .map(([key, value]) => `${escape(key)}=${escape(value)}`)
      .join('&');
  };
};

/**
 * Form-encoded transformer with default options.
 */
export const formEncodedTransformer: BodyTransformer = createFormEncodedTransformer();
