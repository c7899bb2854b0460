/**
 * 설정 타입 정의
 */

/**
 * 경로 설정
 *
 * 모든 경로는 프로젝트 루트 기준으로 만들어진 절대 경로입니다.
 */
export interface PathConfig {
  /** 프로젝트 루트 */
  projectRoot: string;

  /** 데이터 디렉토리 (data/) */
  dataDir: string;

  /** 기본 입력 CSV (샘플 데이터도 여기에 저장) */
  inputPath: string;

  /** 처리 결과 CSV */
  outputPath: string;

  /** 로그 파일 */
  logFilePath: string;
}

/**
 * 난수 소스 ([0, 1) 범위)
 *
 * 테스트에서 결정적인 값을 주입할 때 사용합니다.
 */
export type RandomSource = () => number;
