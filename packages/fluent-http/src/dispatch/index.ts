export { createDispatcher } from './dispatcher.js';
export { classifyOutcome } from './classify.js';
export type { ClassifyContext } from './classify.js';
export type {
  DispatchOptions,
  DispatchSuccess,
  Dispatcher,
  DispatcherConfig,
  TickFn,
} from './types.js';
