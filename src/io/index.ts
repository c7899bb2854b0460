/**
 * IO 모듈 진입점
 */

export {
  readCsvTable,
  writeCsvTable,
  createEmptyTable,
  isEmptyTable,
  formatHead,
  columnValues,
  HEAD_ROWS,
} from './csv';
