export {
  createStringResponse,
  createByteResponse,
  createProgressByteResponse,
} from './responses.js';
export type {
  HttpResponse,
  StringResponse,
  ByteResponse,
  ProgressByteResponse,
  ResponseParseError,
} from './types.js';
