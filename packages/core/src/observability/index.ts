export {
  Logger,
  createLogger,
  type LogEntry,
  type LogLevel,
  type LogListener,
  type LoggerConfig,
} from './logger.js';
