export {
  RippleLogger,
  createLogger,
  describeError,
  type LogEntry,
  type LogHandler,
  type LogLevel,
  type LoggedError,
  type RippleLoggerConfig,
} from './logger.js';
