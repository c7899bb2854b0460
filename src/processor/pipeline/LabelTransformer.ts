/**
 * LabelTransformer - 임계값 레이블 변환기
 *
 * 숫자 컬럼을 임계값과 비교해 두 가지 값 중 하나를 새 컬럼으로 넣습니다.
 * ANNOTATE 단계에서 실행되므로 필터를 통과한 행에만 계산됩니다.
 */

import type { Transformer, TransformContext, LabelTransformerConfig } from './Transformer';
import { PipelinePhase, withTable } from './Transformer';
import { comparison, literal, rowExpr } from './expressions';

export class LabelTransformer implements Transformer {
  readonly name: string;
  readonly phase = PipelinePhase.ANNOTATE;

  private config: LabelTransformerConfig;

  constructor(config: LabelTransformerConfig) {
    this.config = { ...config };
    this.name = `label:${config.targetColumn}`;
  }

  transform(ctx: TransformContext): TransformContext {
    return withTable(ctx, ctx.table.derive({ [this.config.targetColumn]: this.toExpression() }));
  }

  /**
   * @example
   * // 'd => d.value1 > 35 ? "High" : "Medium"'
   */
  toExpression(): string {
    const { sourceColumn, threshold, above, otherwise } = this.config;
    return rowExpr(`${comparison(sourceColumn, 'gt', threshold)} ? ${literal(above)} : ${literal(otherwise)}`);
  }
}
