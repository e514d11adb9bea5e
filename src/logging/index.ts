/**
 * Structured logging for the deferred-call library.
 *
 * All messages go through a single pino logger named `deferred-call`.
 * Level and pretty printing come from {@link loadConfig}.
 */

// Named import: under NodeNext the default import of pino's CommonJS typings is the module object.
import { type Logger, type LoggerOptions, pino } from 'pino';
import { loadConfig } from '../config/index.js';

/**
 * Structured logging fields.
 *
 * Common fields include:
 * - component: Subsystem identifier (e.g., "callback-factory", "shared-ref")
 * - kind: Callback variant being created
 * - target: Function or method name
 * - arity: Number of captured arguments
 */
export interface LogFields {
  [key: string]: string | number | boolean | null | undefined;
}

type PinoFields = Record<string, string | number | boolean | null>;

function buildLogger(): Logger {
  const config = loadConfig();
  const loggerOptions: LoggerOptions = {
    name: 'deferred-call',
    level: config.logLevel,
  };

  if (config.prettyLogs) {
    loggerOptions.transport = {
      target: 'pino-pretty',
      options: { colorize: true },
    };
  }

  return pino(loggerOptions);
}

const log: Logger = buildLogger();

/**
 * Drop undefined values so they never reach the serialized record.
 */
function toPinoFields(fields?: LogFields): PinoFields {
  const result: PinoFields = {};
  if (!fields) {
    return result;
  }

  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * The underlying pino logger.
 *
 * Exposed for tests and for applications that want to attach child loggers.
 */
export function getLogger(): Logger {
  return log;
}

/**
 * Log an ERROR level message with structured fields.
 */
export function logError(message: string, fields?: LogFields): void {
  log.error(toPinoFields(fields), message);
}

/**
 * Log a WARN level message with structured fields.
 *
 * @example
 * logWarn('Released shared reference dereferenced', {
 *   component: 'shared-ref',
 *   receiver: 'Counter',
 * });
 */
export function logWarn(message: string, fields?: LogFields): void {
  log.warn(toPinoFields(fields), message);
}

/**
 * Log an INFO level message with structured fields.
 */
export function logInfo(message: string, fields?: LogFields): void {
  log.info(toPinoFields(fields), message);
}

/**
 * Log a DEBUG level message with structured fields.
 *
 * @example
 * logDebug('Captured deferred call', {
 *   component: 'callback-factory',
 *   kind: 'function',
 *   target: 'add',
 *   arity: 2,
 * });
 */
export function logDebug(message: string, fields?: LogFields): void {
  log.debug(toPinoFields(fields), message);
}

/**
 * Log a TRACE level message with structured fields.
 */
export function logTrace(message: string, fields?: LogFields): void {
  log.trace(toPinoFields(fields), message);
}

/**
 * Logger with preset fields, as returned by {@link createLogger}.
 */
export interface ComponentLogger {
  error(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  debug(message: string, fields?: LogFields): void;
  trace(message: string, fields?: LogFields): void;
}

/**
 * Create a logger with preset fields.
 *
 * @param defaultFields - Fields to include in every log message
 *
 * @example
 * const logger = createLogger({ component: 'callback-factory' });
 * logger.debug('Captured deferred call', { arity: 2 });
 * // Logs: { component: 'callback-factory', arity: 2 }
 */
export function createLogger(defaultFields: LogFields): ComponentLogger {
  const mergeFields = (fields?: LogFields): LogFields => ({
    ...defaultFields,
    ...fields,
  });

  return {
    error: (message, fields) => logError(message, mergeFields(fields)),
    warn: (message, fields) => logWarn(message, mergeFields(fields)),
    info: (message, fields) => logInfo(message, mergeFields(fields)),
    debug: (message, fields) => logDebug(message, mergeFields(fields)),
    trace: (message, fields) => logTrace(message, mergeFields(fields)),
  };
}
