/**
 * Runtime configuration for the deferred-call library.
 *
 * Values are read from environment variables once, when the logging
 * module is first loaded.
 */

/** Log levels accepted by `DEFERRED_CALL_LOG_LEVEL`. */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'silent'];

/** Level used when `DEFERRED_CALL_LOG_LEVEL` is unset or unrecognised. */
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

/**
 * Resolved library configuration.
 */
export interface DeferredCallConfig {
  /** Minimum level passed to the logger. */
  logLevel: LogLevel;

  /** Current environment (development, test, production). */
  environment: string;

  /** Whether log output goes through pino-pretty. */
  prettyLogs: boolean;
}

/**
 * Check whether a string names a supported log level.
 */
export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Build the configuration from environment variables.
 *
 * - `DEFERRED_CALL_LOG_LEVEL`: trace, debug, info, warn, error or silent
 * - `DEFERRED_CALL_ENV`: environment name, falling back to `NODE_ENV`
 *
 * @param env - Environment to read (defaults to `process.env`)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DeferredCallConfig {
  const level = env.DEFERRED_CALL_LOG_LEVEL?.trim().toLowerCase();
  const environment = env.DEFERRED_CALL_ENV || env.NODE_ENV || 'development';

  return {
    logLevel: level && isLogLevel(level) ? level : DEFAULT_LOG_LEVEL,
    environment,
    // Pretty output spawns a transport worker; keep it out of production and test runs
    prettyLogs: environment !== 'production' && environment !== 'test',
  };
}
