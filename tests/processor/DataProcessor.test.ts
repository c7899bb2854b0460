/**
 * DataProcessor 테스트
 *
 * 입력 파일 / 샘플 생성 / 빈 파일 / 읽기 실패 경로와 변환 결과를 검증합니다.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import {
  DataProcessor,
  processData,
  DIVISION_EPSILON,
} from '../../src/processor/DataProcessor';
import { columnValues, readCsvTable } from '../../src/io/csv';
import { INPUT_COLUMNS, DERIVED_COLUMNS, type InputRow } from '../../src/types/table.types';
import {
  FIXED_SAMPLE_RANDOM,
  createMemoryLogger,
  createTempProject,
  getExampleRows,
  sequenceRandom,
  writeInputCsv,
  writeTextFile,
  type MemorySink,
  type TempProject,
} from '../fixtures/generateTestData';
import type { Logger } from '../../src/core/Logger';

describe('DataProcessor', () => {
  let project: TempProject;
  let logger: Logger;
  let sink: MemorySink;

  beforeEach(() => {
    project = createTempProject();
    ({ logger, sink } = createMemoryLogger('processor'));
  });

  afterEach(() => {
    project.cleanup();
  });

  function run(inputPath?: string) {
    return processData(inputPath, {
      paths: project.paths,
      logger,
      random: sequenceRandom(FIXED_SAMPLE_RANDOM),
    });
  }

  // ===========================================================================
  // 입력 파일이 있는 경우
  // ===========================================================================

  describe('입력 파일', () => {
    it('value1 > 20 행만 남기고 value1_type 부여', () => {
      const inputPath = join(project.paths.dataDir, 'test_input.csv');
      writeInputCsv(inputPath, getExampleRows());

      const result = run(inputPath);

      expect(columnValues(result, 'id')).toEqual([2, 3, 4]);
      expect(columnValues(result, 'value1_type')).toEqual(['Medium', 'Medium', 'High']);
      expect(columnValues(result, 'value1_plus_10')).toEqual([35, 45, 55]);
      expect(result.columnNames()).toEqual([...INPUT_COLUMNS, ...DERIVED_COLUMNS]);
    });

    it('value2_div_value1 = value2 / (value1 + epsilon)', () => {
      const inputPath = join(project.paths.dataDir, 'test_input.csv');
      writeInputCsv(inputPath, getExampleRows());

      const ratios = columnValues(run(inputPath), 'value2_div_value1');

      expect(ratios[0]).toBeCloseTo(20 / (25 + DIVISION_EPSILON), 10);
      expect(ratios[1]).toBeCloseTo(30 / (35 + DIVISION_EPSILON), 10);
      expect(ratios[2]).toBeCloseTo(40 / (45 + DIVISION_EPSILON), 10);
    });

    it('결과 행 수 = value1 > 20인 입력 행 수 (20은 제외)', () => {
      const rows: InputRow[] = [20, 21, 0, 50, 35, 36, 5].map((value1, i) => ({
        id: i + 1,
        category: 'A',
        value1,
        value2: i * 1.5,
      }));
      const inputPath = join(project.root, 'many.csv');
      writeInputCsv(inputPath, rows);

      const result = run(inputPath);

      expect(result.numRows()).toBe(rows.filter(r => r.value1 > 20).length);
      expect(columnValues(result, 'value1')).toEqual([21, 50, 35, 36]);
      expect(columnValues(result, 'value1_type')).toEqual(['Medium', 'High', 'Medium', 'High']);
    });

    it('같은 입력을 두 번 처리하면 결과가 같음', () => {
      const inputPath = join(project.root, 'stable.csv');
      writeInputCsv(inputPath, getExampleRows());

      const first = run(inputPath).toCSV();
      const second = run(inputPath).toCSV();

      expect(second).toBe(first);
    });

    it('헤더만 있으면 에러 없이 0행 결과', () => {
      const inputPath = join(project.root, 'header_only.csv');
      writeTextFile(inputPath, 'id,category,value1,value2\n');

      const result = run(inputPath);

      expect(result.numRows()).toBe(0);
      expect(result.columnNames()).toEqual([...INPUT_COLUMNS, ...DERIVED_COLUMNS]);
      expect(sink.messages('error')).toEqual([]);
    });

    it('debug 옵션이면 단계별 소요 시간을 debug로 기록', () => {
      const inputPath = join(project.root, 'timed.csv');
      writeInputCsv(inputPath, getExampleRows());

      processData(inputPath, { paths: project.paths, logger, debug: true });

      const phases = sink.messages('debug')
        .filter(message => /^Phase \w+ took \d+\.\d{2}ms\.$/.test(message))
        .map(message => message.split(' ')[1]);
      expect(phases).toEqual(['DERIVE', 'FILTER', 'ANNOTATE']);
    });

    it('debug 옵션이 없으면 단계별 소요 시간을 기록하지 않음', () => {
      const inputPath = join(project.root, 'untimed.csv');
      writeInputCsv(inputPath, getExampleRows());

      run(inputPath);

      expect(sink.messages('debug').filter(message => message.startsWith('Phase '))).toEqual([]);
    });

    it('읽기 시작과 head를 info로 기록', () => {
      const inputPath = join(project.root, 'logged.csv');
      writeInputCsv(inputPath, getExampleRows());

      run(inputPath);

      const infos = sink.messages('info');
      expect(infos[0]).toBe(`Reading data from: ${inputPath}`);
      expect(infos[1]).toBe('Original table head:');
      expect(infos[3]).toBe("Processed table head (after filtering and adding 'value1_type'):");
      expect(sink.messages('debug')).toContain('Applied FilterTransformer (FILTER), 3 rows remaining.');
    });
  });

  // ===========================================================================
  // 입력 파일이 없는 경우
  // ===========================================================================

  describe('샘플 생성', () => {
    it('샘플을 만들어 기본 입력 경로에 저장하고 계속 처리', () => {
      const result = run(join(project.root, 'non_existent_file.csv'));

      expect(existsSync(project.paths.inputPath)).toBe(true);
      const saved = readCsvTable(project.paths.inputPath);
      expect(saved.numRows()).toBe(5);
      expect(columnValues(saved, 'value1')).toEqual([30, 15, 45, 25, 40]);

      expect(columnValues(result, 'id')).toEqual([1, 3, 4, 5]);
      expect(columnValues(result, 'value1_type')).toEqual(['Medium', 'High', 'Medium', 'High']);
      expect(result.columnNames()).toContain('value1_plus_10');
    });

    it('경로를 주지 않으면 기본 입력 경로 사용', () => {
      const processor = new DataProcessor({
        paths: project.paths,
        logger,
        random: sequenceRandom(FIXED_SAMPLE_RANDOM),
      });

      const first = processor.process();
      expect(sink.messages('warning')).toEqual([
        `Input file '${project.paths.inputPath}' not found. Generating sample data.`,
      ]);

      // 두 번째 실행은 저장된 샘플을 읽음
      const second = processor.process();
      expect(sink.messages('warning')).toHaveLength(1);
      expect(columnValues(second, 'id')).toEqual(columnValues(first, 'id'));
    });

    it('load 결과는 generated', () => {
      const processor = new DataProcessor({ paths: project.paths, logger });
      const outcome = processor.load(join(project.root, 'absent.csv'));

      expect(outcome.status).toBe('generated');
      expect(outcome.path).toBe(project.paths.inputPath);
    });
  });

  // ===========================================================================
  // 실패 경로
  // ===========================================================================

  describe('실패', () => {
    it('0 바이트 파일은 빈 결과 (예외 없음)', () => {
      const emptyPath = join(project.paths.dataDir, 'empty_input.csv');
      writeTextFile(emptyPath, '');

      const result = run(emptyPath);

      expect(result.numRows()).toBe(0);
      expect(sink.messages('error')).toEqual([`Input file '${emptyPath}' is empty. Cannot process.`]);
      expect(existsSync(project.paths.inputPath)).toBe(false);
    });

    it('필수 컬럼이 없으면 읽기 실패로 분류', () => {
      const inputPath = join(project.root, 'partial.csv');
      writeTextFile(inputPath, 'id,category,value1\n1,A,25\n');

      const result = run(inputPath);

      expect(result.numRows()).toBe(0);
      expect(sink.messages('error')).toEqual([
        `Error reading or generating input data from '${inputPath}': Missing required column(s): value2`,
      ]);
      expect(sink.records.find(r => r.level === 'error')?.cause).toBeInstanceOf(Error);
    });

    it('숫자 컬럼에 숫자가 아닌 값이 있으면 읽기 실패로 분류', () => {
      const inputPath = join(project.root, 'bad_number.csv');
      writeTextFile(inputPath, 'id,category,value1,value2\n1,A,30,10\n2,B,abc,20\n3,C,40,5\n');

      const result = run(inputPath);

      expect(result.numRows()).toBe(0);
      expect(sink.messages('error')).toEqual([
        `Error reading or generating input data from '${inputPath}': Non-numeric value(s) in column(s): value1`,
      ]);
    });

    it('두 숫자 컬럼이 모두 잘못되면 둘 다 보고', () => {
      const inputPath = join(project.root, 'bad_both.csv');
      writeTextFile(inputPath, 'id,category,value1,value2\n1,A,x,y\n2,B,25,20\n');

      const processor = new DataProcessor({ paths: project.paths, logger });
      const outcome = processor.load(inputPath);

      expect(outcome.status).toBe('failed');
      expect(sink.messages('error')).toEqual([
        `Error reading or generating input data from '${inputPath}': Non-numeric value(s) in column(s): value1, value2`,
      ]);
    });

    it('디렉토리를 입력으로 주면 읽기 실패로 분류', () => {
      const dirPath = join(project.root, 'a-directory');
      mkdirSync(dirPath);

      const processor = new DataProcessor({ paths: project.paths, logger });
      const outcome = processor.load(dirPath);

      expect(outcome.status).toBe('failed');
      expect(processor.process(dirPath).numRows()).toBe(0);
    });
  });
});
