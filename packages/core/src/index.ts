/**
 * @sibyl/core
 * Configuration, logging and error types shared by every Sibyl package
 */

// Config
export {
  loadBaseConfig,
  getBaseConfig,
  resetBaseConfig,
  type BaseConfig,
  type BaseEnv,
  type ResearchModeSetting,
} from "./config.js";

// Logger
export {
  logger,
  type LogLevel,
  type LogContext,
  type LogEntry,
  type LogHandler,
  type Logger,
} from "./logger.js";

// Errors
export {
  SibylError,
  ConfigError,
  ProviderError,
  ValidationError,
  TaskLostError,
  InvariantError,
  REDACTED,
  invariant,
  isProviderError,
  isRetryableError,
  redactSecrets,
  toRedactedError,
  type ProviderErrorKind,
  type RedactedError,
  type RedactedErrorKind,
} from "./errors.js";
