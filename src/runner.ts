/**
 * 실행 진입점 로직
 *
 * 로깅 구성 → 파이프라인 실행 → 결과 저장 → 요약 로그 순서로 한 번 실행합니다.
 * 파이프라인 밖으로 나온 에러는 여기서 critical로 기록하고 실행을 마칩니다.
 */

import type { PathConfig, RandomSource } from './types/config.types';
import { UnhandledError } from './core/errors';
import { type Logger, createLogger } from './core/Logger';
import { createPathConfig } from './core/paths';
import { isEmptyTable, writeCsvTable } from './io/csv';
import { processData } from './processor/DataProcessor';

// =============================================================================
// 타입
// =============================================================================

export interface RunOptions {
  /** 경로 설정 (기본값: 프로젝트 루트 기준) */
  paths?: PathConfig;

  /** 로거 (기본값: 콘솔 + 로그 파일) */
  logger?: Logger;

  /** 샘플 생성용 난수 소스 */
  random?: RandomSource;
}

/**
 * 실행 요약
 * - saved: 결과 파일 저장
 * - empty: 저장할 행 없음 (빈 입력, 읽기 실패, 필터 후 0행)
 * - failed: 처리되지 않은 에러
 */
export interface RunSummary {
  status: 'saved' | 'empty' | 'failed';
  rowCount: number;
  outputPath?: string;
  error?: UnhandledError;
}

// =============================================================================
// 실행
// =============================================================================

export function runMain(options: RunOptions = {}): RunSummary {
  const paths = options.paths ?? createPathConfig();
  const logger = options.logger ?? createLogger({ logFilePath: paths.logFilePath });

  logger.info('Script execution started.');

  let summary: RunSummary;
  try {
    const processed = processData(paths.inputPath, { paths, logger, random: options.random });

    if (!isEmptyTable(processed)) {
      writeCsvTable(processed, paths.outputPath);
      logger.info(`Processed data successfully saved to: ${paths.outputPath}`);
      summary = { status: 'saved', rowCount: processed.numRows(), outputPath: paths.outputPath };
    } else {
      logger.info('No data to save after processing (table was empty or an error occurred).');
      summary = { status: 'empty', rowCount: 0 };
    }
  } catch (error) {
    const unhandled = new UnhandledError(error);
    logger.critical(unhandled.message, error);
    summary = { status: 'failed', rowCount: 0, error: unhandled };
  }

  logger.info('Script execution finished.');
  return summary;
}
