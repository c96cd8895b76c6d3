import type { DictionaryOptions } from './types.js';

const toStringOrUndefined = (value: unknown): string | undefined => {
  try {
    return String(value);
  } catch {
    return undefined;
  }
};

/**
 * Converts an object's own enumerable fields into a string dictionary.
 *
 * Fields holding null or undefined are left out, as are values whose string
 * conversion throws. Names listed in `fieldNames` replace the field name.
 *
 * @example
 * ```typescript
 * toDictionary({ userName: 'ada', age: 36, nickname: null }, { fieldNames: { userName: 'user_name' } });
 * // { user_name: 'ada', age: '36' }
 * ```
 */
export const toDictionary = (
  obj: object,
  options: DictionaryOptions = {}
): Record<string, string> => {
  const { fieldNames = {} } = options;
  const result: Record<string, string> = {};

  for (const [field, rawValue] of Object.entries(obj)) {
    if (rawValue === null || rawValue === undefined) {
      continue;
    }

    const value = toStringOrUndefined(rawValue);
    if (value === undefined) {
      continue;
    }

    const override = fieldNames[field];
    const key = override !== undefined && override.trim().length > 0 ? override : field;
    result[key] = value;
  }

  return result;
};
