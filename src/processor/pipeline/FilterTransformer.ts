/**
 * FilterTransformer - 필터 변환기
 *
 * 모든 조건(AND)을 만족하는 행만 남긴 새 테이블을 만듭니다.
 * 필터 결과는 reify()로 구체화되어 이후 단계에서 원본 행을 참조하지 않습니다.
 */

import type { Transformer, TransformContext, FilterState } from './Transformer';
import { PipelinePhase, withTable } from './Transformer';
import { comparison, rowExpr } from './expressions';

// =============================================================================
// FilterTransformer 클래스
// =============================================================================

export class FilterTransformer implements Transformer {
  readonly name = 'FilterTransformer';
  readonly phase = PipelinePhase.FILTER;

  /** 필터 조건 (AND) */
  private filters: FilterState[];

  // ==========================================================================
  // 생성자
  // ==========================================================================

  constructor(filters: FilterState[] = []) {
    this.filters = filters;
  }

  // ==========================================================================
  // Transformer 구현
  // ==========================================================================

  /**
   * 필터 변환 실행
   */
  transform(ctx: TransformContext): TransformContext {
    // 필터가 없으면 그대로 반환
    if (this.filters.length === 0) {
      return ctx;
    }

    const filtered = ctx.table.filter(this.toExpression()).reify();
    return withTable(ctx, filtered);
  }

  // ==========================================================================
  // 표현식
  // ==========================================================================

  /**
   * Arquero 필터 표현식
   *
   * @example
   * new FilterTransformer([{ columnKey: 'value1', operator: 'gt', value: 20 }]).toExpression();
   * // 'd => d.value1 > 20'
   */
  toExpression(): string {
    const clauses = this.filters.map(f => comparison(f.columnKey, f.operator, f.value));
    const body = clauses.length === 1 ? clauses.join('') : clauses.map(c => `(${c})`).join(' && ');
    return rowExpr(body);
  }
}
