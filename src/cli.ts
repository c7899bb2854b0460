/**
 * CLI 진입점
 *
 * 기본 경로로 한 번 실행합니다.
 * 실패해도 종료 코드는 0입니다 (실패는 로그로만 알립니다).
 */

import { runMain } from './runner';

runMain();
