/**
 * Core 모듈 진입점
 */

export {
  DataProcessingError,
  EmptyInputError,
  InputReadError,
  UnhandledError,
  describeError,
} from './errors';

export {
  Logger,
  ConsoleSink,
  FileSink,
  createLogger,
  createSilentLogger,
  formatRecord,
  formatTimestamp,
  DEFAULT_LOGGER_NAME,
} from './Logger';
export type { LoggerOptions } from './Logger';

export {
  createPathConfig,
  resolveProjectRoot,
  DATA_DIR_NAME,
  INPUT_FILE_NAME,
  OUTPUT_FILE_NAME,
  LOG_FILE_NAME,
} from './paths';
