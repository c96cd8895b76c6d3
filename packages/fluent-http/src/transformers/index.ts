export {
  jsonTransformer,
  formEncodedTransformer,
  createFormEncodedTransformer,
} from './transformers.js';
export { toDictionary } from './dictionary.js';
export type { BodyTransformer, DictionaryOptions, FormEncodedOptions } from './types.js';
