/**
 * 경로 설정
 *
 * 프로젝트 루트를 기준으로 데이터/로그 경로를 만듭니다.
 * 테스트는 임시 디렉토리를 루트로 넘겨 실제 data/ 폴더를 건드리지 않습니다.
 */

import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { PathConfig } from '../types/config.types';

export const DATA_DIR_NAME = 'data';
export const INPUT_FILE_NAME = 'sample_input.csv';
export const OUTPUT_FILE_NAME = 'processed_output.csv';
export const LOG_FILE_NAME = 'data_processing.log';

/**
 * 프로젝트 루트 (src/의 상위 디렉토리)
 */
export function resolveProjectRoot(): string {
  return fileURLToPath(new URL('../../', import.meta.url));
}

/**
 * 경로 설정 생성
 *
 * @example
 * const paths = createPathConfig('/tmp/project');
 * paths.inputPath; // '/tmp/project/data/sample_input.csv'
 */
export function createPathConfig(projectRoot: string = resolveProjectRoot()): PathConfig {
  const dataDir = join(projectRoot, DATA_DIR_NAME);

  return {
    projectRoot,
    dataDir,
    inputPath: join(dataDir, INPUT_FILE_NAME),
    outputPath: join(dataDir, OUTPUT_FILE_NAME),
    logFilePath: join(dataDir, LOG_FILE_NAME),
  };
}
