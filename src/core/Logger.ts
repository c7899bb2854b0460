/**
 * Logger - 레벨 기반 로거
 *
 * 이름과 싱크 목록을 가진 로깅 핸들입니다.
 * 전역 로거는 두지 않고, 진입점에서 만든 인스턴스를 파이프라인에 넘깁니다.
 *
 * 라인 형식:
 * 2024-01-02 03:04:05,006 - tabular-pipeline - INFO - Script execution started.
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { LogLevel, LogRecord, LogSink } from '../types/logger.types';
import { LOG_LEVEL_PRIORITY } from '../types/logger.types';

// =============================================================================
// 포맷
// =============================================================================

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * 타임스탬프 포맷 (로컬 시간, YYYY-MM-DD HH:mm:ss,SSS)
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time},${pad(date.getMilliseconds(), 3)}`;
}

/**
 * 로그 라인 포맷
 *
 * cause가 있으면 스택(없으면 문자열 표현)을 다음 줄에 붙입니다.
 */
export function formatRecord(record: LogRecord): string {
  const line = `${formatTimestamp(record.timestamp)} - ${record.name} - ${record.level.toUpperCase()} - ${record.message}`;

  if (record.cause === undefined) {
    return line;
  }

  const detail = record.cause instanceof Error
    ? record.cause.stack ?? `${record.cause.name}: ${record.cause.message}`
    : String(record.cause);

  return `${line}\n${detail}`;
}

// =============================================================================
// 싱크
// =============================================================================

/**
 * 콘솔 싱크 (기본: info 이상)
 */
export class ConsoleSink implements LogSink {
  constructor(readonly level: LogLevel = 'info') {}

  write(line: string, record: LogRecord): void {
    switch (record.level) {
      case 'critical':
      case 'error':
        console.error(line);
        break;
      case 'warning':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }
}

/**
 * 파일 싱크 (기본: debug 이상)
 *
 * 동기 append로 기록합니다. 첫 기록 전에 디렉토리를 만듭니다.
 */
export class FileSink implements LogSink {
  private prepared = false;

  constructor(
    readonly filePath: string,
    readonly level: LogLevel = 'debug'
  ) {}

  write(line: string): void {
    if (!this.prepared) {
      mkdirSync(dirname(this.filePath), { recursive: true });
      this.prepared = true;
    }
    appendFileSync(this.filePath, `${line}\n`, 'utf8');
  }
}

// =============================================================================
// Logger 클래스
// =============================================================================

/**
 * Logger 옵션
 */
export interface LoggerOptions {
  /** 로거 이름 */
  name: string;

  /** 출력 싱크 */
  sinks?: LogSink[];

  /** 현재 시각 (테스트용) */
  now?: () => Date;
}

/**
 * 레벨 기반 로거
 */
export class Logger {
  readonly name: string;

  private readonly sinks: readonly LogSink[];

  private now: () => Date;

  constructor(options: LoggerOptions) {
    this.name = options.name;
    this.sinks = options.sinks ?? [];
    this.now = options.now ?? (() => new Date());
  }

  // ==========================================================================
  // 로깅
  // ==========================================================================

  debug(message: string): void {
    this.log('debug', message);
  }

  info(message: string): void {
    this.log('info', message);
  }

  warning(message: string): void {
    this.log('warning', message);
  }

  error(message: string, cause?: unknown): void {
    this.log('error', message, cause);
  }

  critical(message: string, cause?: unknown): void {
    this.log('critical', message, cause);
  }

  /**
   * 레벨을 지정해 기록
   *
   * 각 싱크의 최소 레벨보다 낮은 레코드는 해당 싱크로 보내지 않습니다.
   */
  log(level: LogLevel, message: string, cause?: unknown): void {
    const record: LogRecord = {
      name: this.name,
      level,
      message,
      timestamp: this.now(),
      cause,
    };

    const targets = this.sinks.filter(
      sink => LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[sink.level]
    );
    if (targets.length === 0) {
      return;
    }

    const line = formatRecord(record);
    for (const sink of targets) {
      sink.write(line, record);
    }
  }
}

// =============================================================================
// 팩토리
// =============================================================================

/** 기본 로거 이름 */
export const DEFAULT_LOGGER_NAME = 'tabular-pipeline';

/**
 * 콘솔(info+) + 파일(debug+) 로거 생성
 */
export function createLogger(options: { name?: string; logFilePath: string }): Logger {
  return new Logger({
    name: options.name ?? DEFAULT_LOGGER_NAME,
    sinks: [new FileSink(options.logFilePath, 'debug'), new ConsoleSink('info')],
  });
}

/**
 * 아무것도 기록하지 않는 로거
 */
export function createSilentLogger(name: string = DEFAULT_LOGGER_NAME): Logger {
  return new Logger({ name });
}
