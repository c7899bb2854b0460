/**
 * DataPipeline - 데이터 변환 파이프라인
 *
 * Transformer들을 단계(Phase) 순서대로 실행하여 테이블을 변환합니다.
 * 모든 단계는 동기적으로 실행됩니다.
 *
 * 파이프라인 구조:
 * Loaded → DERIVE → FILTER → ANNOTATE
 */

import type { DataTable } from '../../types/table.types';
import {
  type Transformer,
  type PipelineResult,
  type PipelineOptions,
  PipelinePhase,
  createContext,
} from './Transformer';

// =============================================================================
// DataPipeline 클래스
// =============================================================================

/**
 * 데이터 변환 파이프라인
 *
 * Transformer들을 관리하고 순차적으로 실행합니다.
 */
export class DataPipeline {
  /** 등록된 Transformer 목록 */
  private transformers: Transformer[] = [];

  /** 파이프라인 옵션 */
  private options: PipelineOptions;

  // ==========================================================================
  // 생성자
  // ==========================================================================

  constructor(options: PipelineOptions = {}) {
    this.options = {
      debug: false,
      ...options,
    };
  }

  // ==========================================================================
  // Transformer 관리
  // ==========================================================================

  /**
   * Transformer 추가
   *
   * Phase 순서대로 자동 정렬됩니다. 같은 Phase는 추가 순서를 유지합니다.
   */
  addTransformer(transformer: Transformer): this {
    this.transformers.push(transformer);
    this.sortTransformers();
    return this;
  }

  /**
   * 모든 Transformer 반환
   */
  getTransformers(): readonly Transformer[] {
    return this.transformers;
  }

  /**
   * Transformer 정렬 (Phase 순)
   */
  private sortTransformers(): void {
    this.transformers.sort((a, b) => a.phase - b.phase);
  }

  // ==========================================================================
  // 파이프라인 실행
  // ==========================================================================

  /**
   * 파이프라인 실행
   *
   * @param table - 입력 테이블
   * @returns 파이프라인 결과
   */
  execute(table: DataTable): PipelineResult {
    const { debug, logger } = this.options;
    const startTime = performance.now();
    const phaseTimings = debug ? new Map<PipelinePhase, number>() : undefined;

    let ctx = createContext(table);

    for (const transformer of this.transformers) {
      const phaseStart = debug ? performance.now() : 0;

      ctx = transformer.transform(ctx);

      if (phaseTimings) {
        const phaseTime = performance.now() - phaseStart;
        const existing = phaseTimings.get(transformer.phase) ?? 0;
        phaseTimings.set(transformer.phase, existing + phaseTime);
      }

      logger?.debug(
        `Applied ${transformer.name} (${PipelinePhase[transformer.phase]}), ${ctx.table.numRows()} rows remaining.`
      );
    }

    return {
      context: ctx,
      executionTime: performance.now() - startTime,
      phaseTimings,
    };
  }
}
