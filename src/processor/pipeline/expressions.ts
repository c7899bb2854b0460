/**
 * Arquero 표현식 빌더
 *
 * Arquero는 함수 표현식을 문자열로 파싱하므로, 설정값을 리터럴로 넣은
 * 문자열 표현식(`d => d.value1 > 20`)을 만들어 넘깁니다.
 */

import type { FilterOperator } from './Transformer';

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

const OPERATOR_SYMBOLS: Record<FilterOperator, string> = {
  gt: '>',
  gte: '>=',
  lt: '<',
  lte: '<=',
  eq: '===',
  neq: '!==',
};

/**
 * 컬럼 참조 (`d.name` 또는 `d["name with space"]`)
 */
export function columnRef(name: string): string {
  return IDENTIFIER.test(name) ? `d.${name}` : `d[${JSON.stringify(name)}]`;
}

/**
 * 리터럴
 */
export function literal(value: number | string): string {
  if (typeof value === 'number' && !Number.isFinite(value)) {
    throw new RangeError(`Non-finite literal: ${value}`);
  }
  return JSON.stringify(value);
}

/**
 * 비교식 본문 (화살표 없이)
 */
export function comparison(columnKey: string, operator: FilterOperator, value: number | string): string {
  return `${columnRef(columnKey)} ${OPERATOR_SYMBOLS[operator]} ${literal(value)}`;
}

/**
 * 행 표현식으로 감싸기
 */
export function rowExpr(body: string): string {
  return `d => ${body}`;
}
