/**
 * Utility exports
 */

export { logger, createLogger, initErrorTracking, Logger, type LogLevel, type LogFormat, type LogFields } from './logger.js';
export {
  loadConfig,
  createConfig,
  getConfig,
  getDefaultConfig,
  validateConfig,
  applyLoggingConfig,
  resetConfig,
  type EngineConfig,
  type EngineConfigInput,
  type ClassifierConfig,
  type ExecutorConfig,
  type OrchestratorConfig,
  type MultiCategoryPolicy,
} from './config.js';
export * from './errors.js';
export * from './validation.js';
export { retryWithBackoff, backoffDelay, sleep, RetryExhaustedError, type RetryOptions } from './retry.js';
export { Semaphore } from './semaphore.js';
