export {
  resolveEngineConfig,
  engineConfigSchema,
  DEFAULT_TIMEOUT_SECONDS,
  DEFAULT_PROGRESS_TICK_MS,
  MAX_TIMEOUT_MS,
  MAX_TIMEOUT_SECONDS,
  DEFAULT_LOG_LEVEL,
  ENV_TIMEOUT_SECONDS,
  ENV_PROGRESS_TICK_MS,
  ENV_LOG_LEVEL,
} from './engine-config.js';
export type { EngineConfig, EngineConfigOptions, EnvironmentSource } from './engine-config.js';
