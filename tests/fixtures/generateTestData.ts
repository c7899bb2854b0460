/**
 * 테스트 데이터 / 헬퍼
 *
 * 입력 행, 임시 프로젝트 디렉토리, 결정적 난수 소스, 메모리 로그 싱크를 제공합니다.
 *
 * @example
 * const project = createTempProject();
 * writeInputCsv(project.paths.inputPath, getExampleRows());
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { createPathConfig } from '../../src/core/paths';
import { Logger } from '../../src/core/Logger';
import type { InputRow } from '../../src/types/table.types';
import type { LogLevel, LogRecord, LogSink } from '../../src/types/logger.types';
import type { PathConfig, RandomSource } from '../../src/types/config.types';

// =============================================================================
// 입력 데이터
// =============================================================================

/**
 * 기본 예제 행 (value1: 15, 25, 35, 45, 10)
 */
export function getExampleRows(): InputRow[] {
  return [
    { id: 1, category: 'X', value1: 15, value2: 10 },
    { id: 2, category: 'Y', value1: 25, value2: 20 },
    { id: 3, category: 'X', value1: 35, value2: 30 },
    { id: 4, category: 'Z', value1: 45, value2: 40 },
    { id: 5, category: 'Y', value1: 10, value2: 50 },
  ];
}

/**
 * 행 배열 → CSV 텍스트 (헤더 포함)
 */
export function toCsvText(rows: InputRow[]): string {
  const lines = ['id,category,value1,value2'];
  for (const row of rows) {
    lines.push(`${row.id},${row.category},${row.value1},${row.value2}`);
  }
  return `${lines.join('\n')}\n`;
}

/**
 * 입력 CSV 쓰기
 */
export function writeInputCsv(path: string, rows: InputRow[]): void {
  writeTextFile(path, toCsvText(rows));
}

/**
 * 텍스트 파일 쓰기 (디렉토리 생성 포함)
 */
export function writeTextFile(path: string, content: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content, 'utf8');
}

// =============================================================================
// 임시 프로젝트
// =============================================================================

export interface TempProject {
  root: string;
  paths: PathConfig;
  cleanup(): void;
}

/**
 * 임시 디렉토리를 루트로 하는 경로 설정
 */
export function createTempProject(): TempProject {
  const root = mkdtempSync(join(tmpdir(), 'tabular-pipeline-'));
  return {
    root,
    paths: createPathConfig(root),
    cleanup: () => rmSync(root, { recursive: true, force: true }),
  };
}

// =============================================================================
// 난수
// =============================================================================

/**
 * 주어진 값을 순서대로 반복하는 난수 소스
 */
export function sequenceRandom(values: number[]): RandomSource {
  let index = 0;
  return () => {
    const value = values[index % values.length] ?? 0;
    index++;
    return value;
  };
}

/**
 * 샘플 생성용 고정 난수
 *
 * value1: 30, 15, 45, 25, 40 / value2: 25, 50, 75, 12.5, 0
 */
export const FIXED_SAMPLE_RANDOM = [0.5, 0.125, 0.875, 0.375, 0.75, 0.25, 0.5, 0.75, 0.125, 0];

// =============================================================================
// 로그
// =============================================================================

/**
 * 메모리 로그 싱크
 */
export class MemorySink implements LogSink {
  readonly lines: string[] = [];

  readonly records: LogRecord[] = [];

  constructor(readonly level: LogLevel = 'debug') {}

  write(line: string, record: LogRecord): void {
    this.lines.push(line);
    this.records.push(record);
  }

  /**
   * 메시지 목록 (레벨 지정 시 해당 레벨만)
   */
  messages(level?: LogLevel): string[] {
    return this.records
      .filter(record => level === undefined || record.level === level)
      .map(record => record.message);
  }
}

/**
 * 메모리 싱크 하나를 가진 로거
 */
export function createMemoryLogger(name: string = 'test'): { logger: Logger; sink: MemorySink } {
  const sink = new MemorySink('debug');
  return { logger: new Logger({ name, sinks: [sink] }), sink };
}
