/**
 * 로깅 타입 정의
 */

// ============================================================================
// 로그 레벨
// ============================================================================

/**
 * 로그 레벨
 * - debug < info < warning < error < critical
 */
export type LogLevel = 'debug' | 'info' | 'warning' | 'error' | 'critical';

/** 레벨별 우선순위 (높을수록 심각) */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warning: 30,
  error: 40,
  critical: 50,
};

// ============================================================================
// 로그 레코드 / 싱크
// ============================================================================

/**
 * 로그 레코드
 *
 * Logger가 싱크로 전달하는 한 건의 로그입니다.
 */
export interface LogRecord {
  /** 로거 이름 */
  name: string;

  /** 레벨 */
  level: LogLevel;

  /** 메시지 */
  message: string;

  /** 발생 시각 */
  timestamp: Date;

  /** 원인 에러 (진단 정보용) */
  cause?: unknown;
}

/**
 * 로그 싱크
 *
 * 포맷된 로그 라인을 실제 출력 대상(콘솔, 파일 등)으로 보냅니다.
 */
export interface LogSink {
  /** 이 싱크가 받는 최소 레벨 */
  readonly level: LogLevel;

  /**
   * 로그 기록
   *
   * @param line - 포맷된 로그 라인 (진단 정보 포함)
   * @param record - 원본 레코드
   */
  write(line: string, record: LogRecord): void;
}
