/**
 * runfmt — runtime text templating.
 */

export * from './runtime-format/index.js';
export * from './config/index.js';
export type { Logger, LogLevel } from './shared/utils/index.js';
export { createLogger, getErrorMessage, getLogLevel, setLogLevel } from './shared/utils/index.js';
