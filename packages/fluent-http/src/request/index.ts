export { createRequest } from './request-builder.js';
export type { RequestDependencies } from './request-builder.js';
export {
  createStringOutputHandler,
  createByteOutputHandler,
  createProgressByteOutputHandler,
} from './output-handlers.js';
export type { OutputHandler, RequestBuilder, RequestSnapshot } from './types.js';
