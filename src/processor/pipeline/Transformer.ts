/**
 * Transformer 인터페이스 및 파이프라인 타입 정의
 *
 * 데이터 변환 파이프라인의 핵심 추상화입니다.
 * 각 Transformer는 테이블을 입력받아 변환하고 새 컨텍스트를 반환합니다.
 *
 * 파이프라인 구조:
 * Loaded → DeriveTransformer(s) → FilterTransformer → LabelTransformer → Done
 */

import type { DataTable } from '../../types/table.types';
import type { Logger } from '../../core/Logger';

// =============================================================================
// 파이프라인 단계
// =============================================================================

/**
 * 파이프라인 단계(Phase)
 *
 * 각 Transformer가 실행되는 순서를 결정합니다.
 * 낮은 숫자가 먼저 실행되고, 같은 단계는 추가한 순서를 유지합니다.
 */
export enum PipelinePhase {
  /** 원본 행 기준 파생 컬럼 */
  DERIVE = 1,

  /** 행 필터 */
  FILTER = 2,

  /** 필터 후 레이블 컬럼 */
  ANNOTATE = 3,
}

// =============================================================================
// 변환 컨텍스트
// =============================================================================

/**
 * 변환 컨텍스트
 *
 * Transformer 간에 전달되는 테이블입니다.
 */
export interface TransformContext {
  /** 현재 테이블 */
  table: DataTable;
}

// =============================================================================
// Transformer 인터페이스
// =============================================================================

/**
 * Transformer 인터페이스
 *
 * 데이터 변환의 기본 단위입니다.
 * 각 Transformer는 독립적으로 테스트할 수 있어야 합니다.
 */
export interface Transformer {
  /** Transformer 이름 (로그/디버깅용) */
  readonly name: string;

  /** 실행 단계 */
  readonly phase: PipelinePhase;

  /**
   * 변환 실행
   *
   * @param ctx - 입력 컨텍스트
   * @returns 변환된 컨텍스트
   */
  transform(ctx: TransformContext): TransformContext;
}

// =============================================================================
// 구체적 Transformer 설정
// =============================================================================

/**
 * 필터 연산자
 */
export type FilterOperator = 'gt' | 'gte' | 'lt' | 'lte' | 'eq' | 'neq';

/**
 * 필터 조건
 *
 * @example
 * const filter: FilterState = { columnKey: 'value1', operator: 'gt', value: 20 };
 */
export interface FilterState {
  columnKey: string;
  operator: FilterOperator;
  value: number | string;
}

/**
 * Derive Transformer 설정
 */
export interface DeriveTransformerConfig {
  /** 이름 (없으면 첫 번째 컬럼 이름 기반) */
  name?: string;

  /** 새 컬럼 이름 → Arquero 표현식 */
  columns: Record<string, string>;
}

/**
 * Label Transformer 설정
 *
 * `source > threshold`이면 above, 아니면 otherwise 값을 넣습니다.
 */
export interface LabelTransformerConfig {
  sourceColumn: string;
  targetColumn: string;
  threshold: number;
  above: string;
  otherwise: string;
}

// =============================================================================
// 파이프라인 실행 타입
// =============================================================================

/**
 * 파이프라인 실행 결과
 */
export interface PipelineResult {
  /** 최종 컨텍스트 */
  context: TransformContext;

  /** 실행 시간 (ms) */
  executionTime: number;

  /** 각 단계별 실행 시간 (debug 모드에서만) */
  phaseTimings?: Map<PipelinePhase, number>;
}

/**
 * 파이프라인 옵션
 */
export interface PipelineOptions {
  /** 디버그 모드 (타이밍 기록) */
  debug?: boolean;

  /** 단계별 debug 로그 대상 */
  logger?: Logger;
}

// =============================================================================
// 헬퍼 함수
// =============================================================================

/**
 * 변환 컨텍스트 생성
 */
export function createContext(table: DataTable): TransformContext {
  return { table };
}

/**
 * 컨텍스트 복사 (테이블 교체)
 */
export function withTable(ctx: TransformContext, table: DataTable): TransformContext {
  return { ...ctx, table };
}
