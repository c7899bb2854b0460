/**
 * 타입 모듈 진입점
 */

export { INPUT_COLUMNS, DERIVED_COLUMNS } from './table.types';
export type {
  DataTable,
  InputColumn,
  DerivedColumn,
  InputRow,
} from './table.types';

export { LOG_LEVEL_PRIORITY } from './logger.types';
export type { LogLevel, LogRecord, LogSink } from './logger.types';

export type { PathConfig, RandomSource } from './config.types';
