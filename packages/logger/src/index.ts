export { NullLogger, createNullLogger } from "./adapters/null/null-logger"
export { PinoLogger, createPinoLogger, type PinoLoggerDeps } from "./adapters/pino/pino-logger"
export type {
  CacheOp,
  CacheStatus,
  LogContext,
  LogContextPatch,
  LogEvent,
  LogMeta,
} from "./ports/log-context"
export {
  isLogLevelName,
  LogLevels,
  logLevelNames,
  type LogLevel,
  type LogLevelName,
} from "./ports/log-level"
export type { Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
