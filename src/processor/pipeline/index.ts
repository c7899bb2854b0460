/**
 * Pipeline 모듈 진입점
 *
 * 데이터 변환 파이프라인 관련 클래스와 타입을 내보냅니다.
 */

// 핵심 클래스
export { DataPipeline } from './DataPipeline';

// Transformer 구현
export { DeriveTransformer } from './DeriveTransformer';
export { FilterTransformer } from './FilterTransformer';
export { LabelTransformer } from './LabelTransformer';

// 표현식 빌더
export { columnRef, literal, comparison, rowExpr } from './expressions';

// 타입 및 인터페이스
export { PipelinePhase, createContext, withTable } from './Transformer';

export type {
  Transformer,
  TransformContext,
  FilterOperator,
  FilterState,
  DeriveTransformerConfig,
  LabelTransformerConfig,
  PipelineResult,
  PipelineOptions,
} from './Transformer';
