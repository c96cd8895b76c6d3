/**
 * Serializes a request body into the payload string.
 * Returning undefined sends no payload.
 */
export type BodyTransformer = (body: unknown) => string | undefined;

/**
 * Options for converting an object into a string dictionary.
 */
export interface DictionaryOptions {
  /**
   * Renames fields in the output, keyed by the object's own field name.
   * @example { userName: 'user_name' }
   */
  readonly fieldNames?: Readonly<Record<string, string>>;
}

/**
 * Options for the form-encoded transformer.
 */
export interface FormEncodedOptions extends DictionaryOptions {
  /** Percent-encode keys and values (default: false, pairs are joined as-is) */
  readonly encode?: boolean;
}
