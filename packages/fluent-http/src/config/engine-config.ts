import { z } from 'zod';
import type { LogLevel } from '../logging/types.js';

/** Default request timeout: 30 seconds */
export const DEFAULT_TIMEOUT_SECONDS = 30;

/** Default progress polling interval: one 60 Hz frame */
export const DEFAULT_PROGRESS_TICK_MS = 16;

/** Longest delay a Node.js timer accepts: 2^31 - 1 ms, about 24.8 days */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/** Longest timeout, in whole seconds, that fits a Node.js timer */
export const MAX_TIMEOUT_SECONDS = Math.floor(MAX_TIMEOUT_MS / 1000);

/** Default log level: the library is quiet unless asked */
export const DEFAULT_LOG_LEVEL: LogLevel = 'silent';

/**
 * Environment variables read by {@link resolveEngineConfig}.
 */
export const ENV_TIMEOUT_SECONDS = 'FLUENT_HTTP_TIMEOUT_SECONDS';
export const ENV_PROGRESS_TICK_MS = 'FLUENT_HTTP_PROGRESS_TICK_MS';
export const ENV_LOG_LEVEL = 'FLUENT_HTTP_LOG_LEVEL';

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/**
 * Schema for a fully resolved engine configuration.
 * Numeric values coming from the environment are coerced from strings.
 */
export const engineConfigSchema = z.object({
  timeoutSeconds: z.coerce.number().int().positive().max(MAX_TIMEOUT_SECONDS),
  progressTickMs: z.coerce.number().int().positive().max(MAX_TIMEOUT_MS),
  logLevel: logLevelSchema,
  defaultHeaders: z.record(z.string(), z.string()),
});

/**
 * Resolved engine configuration.
 */
export type EngineConfig = z.infer<typeof engineConfigSchema>;

/**
 * Configuration overrides accepted by the engine.
 * Omitted values fall back to the environment, then to defaults.
 */
export interface EngineConfigOptions {
  /** Timeout applied when a request does not set one (default: 30) */
  readonly timeoutSeconds?: number;
  /** Interval between progress reads while a download is in flight (default: 16) */
  readonly progressTickMs?: number;
  /** Level for the built-in console logger (default: 'silent') */
  readonly logLevel?: LogLevel;
  /** Headers sent with every request made by the engine */
  readonly defaultHeaders?: Readonly<Record<string, string>>;
}

/**
 * Environment source, usually `process.env`.
 */
export type EnvironmentSource = Readonly<Record<string, string | undefined>>;

const readEnv = (env: EnvironmentSource, key: string): string | undefined => {
  const value = env[key];
  return value === undefined || value.trim().length === 0 ? undefined : value.trim();
};

/**
 * Resolves engine configuration with priority: options > environment > defaults.
 *
 * @param options - Explicit overrides
 * @param env - Environment source (default: process.env)
 * @returns The validated configuration
 * @throws Error naming every invalid field
 *
 * @example
 * ```typescript
 * // FLUENT_HTTP_TIMEOUT_SECONDS=10
 * const config = resolveEngineConfig({ logLevel: 'debug' });
 * config.timeoutSeconds; // 10
 * ```
 */
export const resolveEngineConfig = (
  options: EngineConfigOptions = {},
  env: EnvironmentSource = process.env
): EngineConfig => {
  const raw = {
    timeoutSeconds:
      options.timeoutSeconds ?? readEnv(env, ENV_TIMEOUT_SECONDS) ?? DEFAULT_TIMEOUT_SECONDS,
    progressTickMs:
      options.progressTickMs ?? readEnv(env, ENV_PROGRESS_TICK_MS) ?? DEFAULT_PROGRESS_TICK_MS,
    logLevel: options.logLevel ?? readEnv(env, ENV_LOG_LEVEL) ?? DEFAULT_LOG_LEVEL,
    defaultHeaders: { ...options.defaultHeaders },
  };

  const parsed = engineConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid fluent-http configuration: ${details}`);
  }

  return parsed.data;
};
