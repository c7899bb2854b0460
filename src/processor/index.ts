/**
 * Processor 모듈 진입점
 */

export {
  DataProcessor,
  processData,
  createProcessingPipeline,
  VALUE1_OFFSET,
  DIVISION_EPSILON,
  FILTER_THRESHOLD,
  HIGH_THRESHOLD,
  NUMERIC_COLUMNS,
} from './DataProcessor';
export type { ProcessOptions, LoadOutcome } from './DataProcessor';

export {
  createSampleTable,
  randomInt,
  SAMPLE_ROW_COUNT,
  SAMPLE_CATEGORIES,
  VALUE1_RANGE,
  VALUE2_SCALE,
} from './SampleGenerator';

export * from './pipeline';
