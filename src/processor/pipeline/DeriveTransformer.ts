/**
 * DeriveTransformer - 파생 컬럼 변환기
 *
 * 기존 컬럼만 참조하는 표현식으로 새 컬럼을 추가합니다.
 * 설정의 키 순서대로 컬럼이 뒤에 붙습니다.
 */

import type { Transformer, TransformContext, DeriveTransformerConfig } from './Transformer';
import { PipelinePhase, withTable } from './Transformer';

export class DeriveTransformer implements Transformer {
  readonly name: string;
  readonly phase: PipelinePhase;

  private columns: Record<string, string>;

  constructor(config: DeriveTransformerConfig, phase: PipelinePhase = PipelinePhase.DERIVE) {
    const names = Object.keys(config.columns);
    if (names.length === 0) {
      throw new Error('DeriveTransformer: at least one column expression is required');
    }

    this.name = config.name ?? `derive:${names.join(',')}`;
    this.phase = phase;
    this.columns = { ...config.columns };
  }

  transform(ctx: TransformContext): TransformContext {
    return withTable(ctx, ctx.table.derive(this.columns));
  }
}
