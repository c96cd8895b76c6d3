export { createFetchTransport } from './fetch-transport.js';
export type { FetchTransportOptions } from './fetch-transport.js';
export { HttpMethod } from './types.js';
export type {
  Transport,
  TransportOperation,
  TransportOutcome,
  TransportRequest,
} from './types.js';
