/**
 * Tabular Pipeline - CSV 배치 변환
 *
 * Arquero 기반으로 CSV를 읽고(없으면 샘플 생성) 파생 컬럼 추가, 필터,
 * 레이블 추가를 거쳐 결과를 저장합니다.
 */

// 타입 내보내기
export * from './types';

// 코어 모듈 (로깅, 에러, 경로)
export * from './core';

// 입출력
export * from './io';

// 프로세서 모듈
export * from './processor';

// 실행
export { runMain } from './runner';
export type { RunOptions, RunSummary } from './runner';
