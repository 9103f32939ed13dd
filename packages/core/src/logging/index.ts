export {
  Logger,
  redactSecrets,
  createTraceId,
  type LogLevel,
  type LogFormat,
  type LogSink,
  type LoggerOptions,
} from './logger.js';
