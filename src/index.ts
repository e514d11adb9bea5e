/**
 * deferred-call
 *
 * Capture a function or method call with its arguments now, run it later
 * through one uniform `invoke()` interface.
 *
 * @packageDocumentation
 */

// =============================================================================
// Callbacks - invocation interface, variants and factory layer
// =============================================================================
export * from './callback/index.js';

// =============================================================================
// Shared receivers
// =============================================================================
export { SharedRef, shared } from './shared/shared-ref.js';
export { typeName } from './shared/type-name.js';

// =============================================================================
// Configuration and logging
// =============================================================================
export {
  DEFAULT_LOG_LEVEL,
  type DeferredCallConfig,
  isLogLevel,
  type LogLevel,
  loadConfig,
} from './config/index.js';
export {
  type ComponentLogger,
  createLogger,
  getLogger,
  type LogFields,
  logDebug,
  logError,
  logInfo,
  logTrace,
  logWarn,
} from './logging/index.js';
