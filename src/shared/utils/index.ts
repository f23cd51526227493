export { getErrorMessage } from './error.js';
export type { Logger, LogLevel, LogData } from './debug.js';
export {
  LOG_LEVELS,
  createLogger,
  getLogLevel,
  isLogLevel,
  resetLogLevel,
  setLogLevel,
  shouldLog,
} from './debug.js';
