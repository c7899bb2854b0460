/**
 * DataProcessor - 입력 로드 + 변환 파이프라인
 *
 * 입력 CSV를 읽고(없으면 샘플 생성 후 저장) 파생 컬럼 추가 → 필터 →
 * 레이블 추가를 거친 테이블을 반환합니다.
 *
 * 상태 흐름:
 * Start → ResolvedPath → {Loaded | Generated | Failed(Empty) | Failed(Other)}
 *       → Transformed → Filtered → Annotated → Done
 *
 * 예상된 실패(빈 입력, 읽기/파싱 실패)는 여기서 로그를 남기고 빈 테이블로
 * 돌려줍니다. 빈 테이블 = "저장할 것 없음"입니다.
 */

import { existsSync, mkdirSync } from 'node:fs';
import type { DataTable } from '../types/table.types';
import { INPUT_COLUMNS } from '../types/table.types';
import type { PathConfig, RandomSource } from '../types/config.types';
import { EmptyInputError, InputReadError } from '../core/errors';
import { type Logger, createSilentLogger } from '../core/Logger';
import { createPathConfig } from '../core/paths';
import { columnValues, createEmptyTable, formatHead, readCsvTable, writeCsvTable } from '../io/csv';
import { createSampleTable } from './SampleGenerator';
import {
  DataPipeline,
  DeriveTransformer,
  FilterTransformer,
  LabelTransformer,
  PipelinePhase,
  columnRef,
  literal,
  rowExpr,
} from './pipeline';

// =============================================================================
// 상수
// =============================================================================

/** value1_plus_10 오프셋 */
export const VALUE1_OFFSET = 10;

/** 0 나눗셈 방지용 엡실론 */
export const DIVISION_EPSILON = 1e-6;

/** 필터 기준 (value1 > 20) */
export const FILTER_THRESHOLD = 20;

/** High 기준 (value1 > 35) */
export const HIGH_THRESHOLD = 35;

/** 숫자여야 하는 입력 컬럼 */
export const NUMERIC_COLUMNS = ['value1', 'value2'] as const;

// =============================================================================
// 타입
// =============================================================================

/**
 * 처리 옵션
 */
export interface ProcessOptions {
  /** 경로 설정 (기본값: 프로젝트 루트 기준) */
  paths?: PathConfig;

  /** 로거 (기본값: 출력 없음) */
  logger?: Logger;

  /** 샘플 생성용 난수 소스 */
  random?: RandomSource;

  /** 파이프라인 단계별 타이밍을 debug로 기록 */
  debug?: boolean;
}

/**
 * 로드 결과
 */
export type LoadOutcome =
  | { status: 'loaded'; path: string; table: DataTable }
  | { status: 'generated'; path: string; table: DataTable }
  | { status: 'empty'; path: string; error: EmptyInputError }
  | { status: 'failed'; path: string; error: InputReadError };

// =============================================================================
// 파이프라인 구성
// =============================================================================

/**
 * 기본 변환 파이프라인
 *
 * value1_plus_10 → value2_div_value1 → (value1 > 20) → value1_type
 */
export function createProcessingPipeline(options: { logger?: Logger; debug?: boolean } = {}): DataPipeline {
  const value1 = columnRef('value1');
  const value2 = columnRef('value2');

  return new DataPipeline(options)
    .addTransformer(new DeriveTransformer({
      name: 'value1_plus_10',
      columns: { value1_plus_10: rowExpr(`${value1} + ${literal(VALUE1_OFFSET)}`) },
    }))
    .addTransformer(new DeriveTransformer({
      name: 'value2_div_value1',
      columns: { value2_div_value1: rowExpr(`${value2} / (${value1} + ${literal(DIVISION_EPSILON)})`) },
    }))
    .addTransformer(new FilterTransformer([
      { columnKey: 'value1', operator: 'gt', value: FILTER_THRESHOLD },
    ]))
    .addTransformer(new LabelTransformer({
      sourceColumn: 'value1',
      targetColumn: 'value1_type',
      threshold: HIGH_THRESHOLD,
      above: 'High',
      otherwise: 'Medium',
    }));
}

// =============================================================================
// DataProcessor 클래스
// =============================================================================

export class DataProcessor {
  private paths: PathConfig;

  private logger: Logger;

  private random: RandomSource;

  private pipeline: DataPipeline;

  constructor(options: ProcessOptions = {}) {
    this.paths = options.paths ?? createPathConfig();
    this.logger = options.logger ?? createSilentLogger();
    this.random = options.random ?? Math.random;
    this.pipeline = createProcessingPipeline({ logger: this.logger, debug: options.debug });
  }

  /**
   * 입력을 읽어 변환한 테이블 반환
   *
   * @param inputPath - 입력 CSV (비어 있으면 기본 입력 경로)
   * @returns 필터 + 레이블까지 끝난 테이블 (실패 시 빈 테이블)
   */
  process(inputPath?: string): DataTable {
    mkdirSync(this.paths.dataDir, { recursive: true });

    const effectivePath = inputPath ? inputPath : this.paths.inputPath;
    const outcome = this.load(effectivePath);

    if (outcome.status === 'empty' || outcome.status === 'failed') {
      return createEmptyTable();
    }

    this.logger.info('Original table head:');
    this.logger.info(`\n${formatHead(outcome.table)}`);

    this.logger.debug('Starting transformations.');
    const { context, executionTime, phaseTimings } = this.pipeline.execute(outcome.table);
    for (const [phase, time] of phaseTimings ?? []) {
      this.logger.debug(`Phase ${PipelinePhase[phase]} took ${time.toFixed(2)}ms.`);
    }
    this.logger.debug(`Transformations finished in ${executionTime.toFixed(2)}ms.`);

    this.logger.info("Processed table head (after filtering and adding 'value1_type'):");
    this.logger.info(`\n${formatHead(context.table)}`);

    return context.table;
  }

  /**
   * 입력 로드 (없으면 샘플 생성 후 기본 입력 경로에 저장)
   */
  load(effectivePath: string): LoadOutcome {
    try {
      if (existsSync(effectivePath)) {
        this.logger.info(`Reading data from: ${effectivePath}`);
        const table = readCsvTable(effectivePath);
        assertInputColumns(table);
        assertNumericColumns(table);
        return { status: 'loaded', path: effectivePath, table };
      }

      this.logger.warning(`Input file '${effectivePath}' not found. Generating sample data.`);
      const table = createSampleTable(this.random, this.logger);
      writeCsvTable(table, this.paths.inputPath);
      this.logger.info(`Sample data generated and saved to: ${this.paths.inputPath}`);
      return { status: 'generated', path: this.paths.inputPath, table };
    } catch (error) {
      if (error instanceof EmptyInputError) {
        this.logger.error(error.message);
        return { status: 'empty', path: effectivePath, error };
      }

      const readError = new InputReadError(effectivePath, error);
      this.logger.error(readError.message, error);
      return { status: 'failed', path: effectivePath, error: readError };
    }
  }
}

/**
 * 입력 컬럼 확인
 */
function assertInputColumns(table: DataTable): void {
  const present = new Set(table.columnNames());
  const missing = INPUT_COLUMNS.filter(name => !present.has(name));

  if (missing.length > 0) {
    throw new Error(`Missing required column(s): ${missing.join(', ')}`);
  }
}

/**
 * 숫자 컬럼 확인
 *
 * 셀 하나라도 숫자가 아니면 Arquero가 컬럼 전체를 문자열로 읽으므로
 * 파생 계산 전에 걸러냅니다. 빈 셀(null)은 허용합니다.
 */
function assertNumericColumns(table: DataTable): void {
  const invalid = NUMERIC_COLUMNS.filter(name =>
    columnValues(table, name).some(
      value => value !== null && value !== undefined && !(typeof value === 'number' && Number.isFinite(value))
    )
  );

  if (invalid.length > 0) {
    throw new Error(`Non-numeric value(s) in column(s): ${invalid.join(', ')}`);
  }
}

/**
 * 입력을 읽어 변환한 테이블 반환
 *
 * @example
 * const result = processData('data/sample_input.csv', { logger });
 * if (!isEmptyTable(result)) writeCsvTable(result, paths.outputPath);
 */
export function processData(inputPath?: string, options: ProcessOptions = {}): DataTable {
  return new DataProcessor(options).process(inputPath);
}
