export type { ILogger } from './ILogger.js';
export { PinoLogger } from './PinoLogger.js';
export {
  LOG_LEVELS,
  isLogLevel,
  normalizeLogLevel,
  resolveLogLevel,
  type LogLevel,
} from './logLevel.js';
export {
  createLogger,
  setLoggerFactory,
  resetLoggerFactory,
  configureRootLogger,
  type LoggerFactory,
} from './loggerFactory.js';
