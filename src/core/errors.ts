/**
 * 데이터 처리 에러 정의
 *
 * 파이프라인 안에서 복구되는 에러(EmptyInputError, InputReadError)와
 * 최상위 실행 단계에서만 잡히는 에러(UnhandledError)를 구분합니다.
 */

/**
 * 데이터 처리 에러 (기본 클래스)
 */
export class DataProcessingError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'DataProcessingError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * 입력 내용이 비어 있음 (0 바이트, 공백뿐, 컬럼 없음)
 */
export class EmptyInputError extends DataProcessingError {
  constructor(public readonly path: string) {
    super(`Input file '${path}' is empty. Cannot process.`);
    this.name = 'EmptyInputError';
  }
}

/**
 * 그 밖의 입력 읽기/파싱 실패
 */
export class InputReadError extends DataProcessingError {
  constructor(public readonly path: string, cause: unknown) {
    super(`Error reading or generating input data from '${path}': ${describeError(cause)}`, cause);
    this.name = 'InputReadError';
  }
}

/**
 * 파이프라인 밖으로 빠져나온 예상치 못한 에러
 */
export class UnhandledError extends DataProcessingError {
  constructor(cause: unknown) {
    super(`An unhandled error occurred during script execution: ${describeError(cause)}`, cause);
    this.name = 'UnhandledError';
  }
}

/**
 * 에러 메시지 추출
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
