// Types
export { type Result, type Ok, type Err, ok, err } from './types/result.ts';

// Errors
export { AppError, toError, type Severity, type AppErrorDTO } from './errors/app-error.ts';

// Logger
export {
  createLogger,
  createSilentLogger,
  LOG_LEVELS,
  type Logger,
  type LogEntry,
  type LogLevel,
  type LogContext,
  type LogWriter,
  type Clock,
  type CreateLoggerOptions,
} from './logger/index.ts';

// Config
export {
  loadWarehouseConfig,
  DEFAULT_DB_PATH,
  DEFAULT_RAW_MESSAGES_DIR,
  DEFAULT_DATE_DIM_START,
  DEFAULT_DATE_DIM_END,
  type WarehouseConfig,
  type EnvSource,
} from './config/index.ts';
