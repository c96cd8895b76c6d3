export { createHttpEngine } from './http-engine.js';
export type { HttpEngine, HttpEngineOptions } from './types.js';
