/**
 * 테이블 타입 정의
 *
 * 파이프라인에서 다루는 테이블과 컬럼 이름을 정의합니다.
 * 테이블 자체는 Arquero의 컬럼 지향 테이블을 그대로 사용합니다.
 */

import type * as aq from 'arquero';

// ============================================================================
// 테이블
// ============================================================================

/**
 * 파이프라인 테이블 (Arquero ColumnTable)
 */
export type DataTable = ReturnType<typeof aq.table>;

// ============================================================================
// 컬럼
// ============================================================================

/** 입력 CSV가 반드시 가져야 하는 컬럼 (순서 고정) */
export const INPUT_COLUMNS = ['id', 'category', 'value1', 'value2'] as const;

export type InputColumn = (typeof INPUT_COLUMNS)[number];

/** 파이프라인이 추가하는 파생 컬럼 (추가 순서 고정) */
export const DERIVED_COLUMNS = ['value1_plus_10', 'value2_div_value1', 'value1_type'] as const;

export type DerivedColumn = (typeof DERIVED_COLUMNS)[number];

/**
 * 입력 행
 *
 * @example
 * const row: InputRow = { id: 1, category: 'A', value1: 25, value2: 12.5 };
 */
export interface InputRow {
  id: number;
  category: string;
  value1: number;
  value2: number;
}
