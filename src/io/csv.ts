/**
 * CSV 입출력
 *
 * Arquero의 fromCSV / toCSV로 파일과 테이블을 변환합니다.
 * 파일 I/O는 동기 방식입니다 (배치 1회 실행용).
 */

import * as aq from 'arquero';
import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { EmptyInputError } from '../core/errors';
import type { DataTable } from '../types/table.types';

/** 로그에 출력할 기본 행 수 */
export const HEAD_ROWS = 5;

// =============================================================================
// 읽기
// =============================================================================

/**
 * CSV 파일을 테이블로 읽기
 *
 * 내용이 비었거나 컬럼이 하나도 없으면 EmptyInputError를 던집니다.
 * 헤더만 있으면 0행 테이블을 반환합니다.
 * 파일 시스템 에러는 그대로 전파됩니다.
 */
export function readCsvTable(path: string): DataTable {
  const text = readFileSync(path, 'utf8');

  if (text.trim().length === 0) {
    throw new EmptyInputError(path);
  }

  const lines = text.split(/\r?\n/).filter(line => line.trim().length > 0);
  if (lines.length === 1) {
    return createHeaderOnlyTable(lines.join(''));
  }

  const table = aq.fromCSV(text);
  if (table.numCols() === 0) {
    throw new EmptyInputError(path);
  }

  return table;
}

/**
 * 헤더 라인 → 0행 테이블
 *
 * fromCSV는 데이터 행이 없는 입력을 처리하지 못하므로 직접 만듭니다.
 */
function createHeaderOnlyTable(header: string): DataTable {
  const names = header
    .split(',')
    .map(name => name.trim().replace(/^"(.*)"$/, '$1'))
    .filter(name => name.length > 0);

  return aq.table(Object.fromEntries(names.map(name => [name, []])));
}

// =============================================================================
// 쓰기
// =============================================================================

/**
 * 테이블을 CSV 파일로 쓰기 (헤더 포함, 인덱스 컬럼 없음)
 *
 * 대상 디렉토리가 없으면 먼저 만듭니다.
 */
export function writeCsvTable(table: DataTable, path: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, table.toCSV(), 'utf8');
}

// =============================================================================
// 유틸리티
// =============================================================================

/**
 * 빈 테이블 (행/컬럼 없음)
 */
export function createEmptyTable(): DataTable {
  return aq.table({});
}

/**
 * 행이 하나도 없는지 확인
 */
export function isEmptyTable(table: DataTable): boolean {
  return table.numRows() === 0;
}

/**
 * 앞부분 미리보기 (마크다운)
 */
export function formatHead(table: DataTable, rows: number = HEAD_ROWS): string {
  return table.toMarkdown({ limit: rows });
}

/**
 * 컬럼 값 배열 (필터/정렬 반영)
 */
export function columnValues(table: DataTable, name: string): unknown[] {
  return Array.from<unknown>(table.array(name));
}
