export {
  JsonLineLogger,
  LOG_LEVELS,
  noopLogger,
  type JsonLineLoggerOptions,
  type LogLevel,
  type StructuredLogEvent,
  type StructuredLogger,
} from './structured-logger.js';
