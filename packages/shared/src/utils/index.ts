export { generateId } from './id.js';
export { isoNow, toEpochMs } from './clock.js';
export {
  SynapticError,
  ValidationError,
  ConfigError,
  BackendUnavailableError,
  CollectionNotFoundError,
  DimensionMismatchError,
  ConfirmationRequiredError,
  OperationAbortedError,
  getErrorMessage,
  throwIfAborted,
} from './errors.js';
export { createLogger, setLogLevel, getLogLevel, formatLogLine } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export { cosineSimilarity } from './vector.js';
