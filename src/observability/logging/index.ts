export {
  type LogLevel,
  LOG_LEVELS,
  type LoggerConfig,
  type LoggerOptions,
  type ILogger,
  configureLogger,
  getLoggerConfig,
  getLogger,
  resetLogger,
  redact,
} from './logger.js';
