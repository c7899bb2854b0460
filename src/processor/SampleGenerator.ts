/**
 * 샘플 데이터 생성
 *
 * 입력 파일이 없을 때 쓰는 5행짜리 테이블을 메모리에서 만듭니다.
 * 저장은 호출하는 쪽의 몫입니다.
 */

import * as aq from 'arquero';
import type { DataTable } from '../types/table.types';
import type { RandomSource } from '../types/config.types';
import type { Logger } from '../core/Logger';

// =============================================================================
// 설정
// =============================================================================

export const SAMPLE_ROW_COUNT = 5;

/** category 값 (행 순서대로) */
export const SAMPLE_CATEGORIES = ['A', 'B', 'A', 'C', 'B'] as const;

/** value1 범위 [min, max) */
export const VALUE1_RANGE = { min: 10, max: 50 } as const;

/** value2 상한 (0 이상, 상한 미만) */
export const VALUE2_SCALE = 100;

// =============================================================================
// 유틸리티 함수
// =============================================================================

/**
 * [min, max) 범위 랜덤 정수
 */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return Math.floor(random() * (max - min)) + min;
}

// =============================================================================
// 생성
// =============================================================================

/**
 * 샘플 테이블 생성
 *
 * @param random - [0, 1) 난수 소스 (기본값: Math.random)
 * @param logger - debug 로그 대상 (선택)
 *
 * @example
 * const table = createSampleTable();
 * table.columnNames(); // ['id', 'category', 'value1', 'value2']
 */
export function createSampleTable(random: RandomSource = Math.random, logger?: Logger): DataTable {
  logger?.debug('Creating sample table.');

  const ids: number[] = [];
  const value1: number[] = [];
  const value2: number[] = [];

  for (let i = 0; i < SAMPLE_ROW_COUNT; i++) {
    ids.push(i + 1);
    value1.push(randomInt(random, VALUE1_RANGE.min, VALUE1_RANGE.max));
  }
  for (let i = 0; i < SAMPLE_ROW_COUNT; i++) {
    value2.push(random() * VALUE2_SCALE);
  }

  const table = aq.table({
    id: ids,
    category: [...SAMPLE_CATEGORIES],
    value1,
    value2,
  });

  logger?.debug(`Sample table created with ${table.numRows()} rows.`);
  return table;
}
