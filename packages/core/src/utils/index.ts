export { contentHash } from './hash.js';
export { withRetry, backoffDelay, type RetryOptions } from './retry.js';
export { Semaphore } from './semaphore.js';
export { sleep, pause, withTimeout } from './sleep.js';
export {
  type Logger,
  noopLogger,
  consoleLogger,
  createConsoleLogger,
  type LogLevel,
  type ConsoleLoggerOptions,
  withLogContext,
} from './logger.js';
