export {
  TidewayLogger,
  isDebugMode,
  setDebugMode,
  silentLogger,
  type LogContext,
  type LogEntry,
  type LogLevel,
  type TidewayLoggerConfig,
} from './logger.js';
