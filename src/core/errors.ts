/**
 * debsnap 에러 분류
 * 파이프라인을 중단시키는 실패만 예외로 표현하고, 패키지/파일 단위 실패는 결과 값으로 다룬다.
 */

import type { CommandResult } from './shared/command-runner';

export type DebsnapErrorCode =
  // 로컬 설정 에러 (변경 전에 중단)
  | 'MISSING_TOOL'
  | 'NOT_ROOT'
  | 'REPO_NOT_FOUND'
  | 'STAGING_INVALID'
  | 'UPDATE_FETCH_FAILED'
  | 'INDEX_FAILED'
  // 안전 관련 에러 (파이프라인 도중 중단, 운영자 복구 필요)
  | 'QUARANTINE_FAILED'
  | 'STRAY_SOURCE'
  | 'VERIFICATION_FAILED'
  | 'INVALID_TRANSITION'
  // 감사
  | 'INVENTORY_MISMATCH'
  | 'COMMAND_FAILED';

/** 에러 코드별 프로세스 종료 코드 */
export const EXIT_CODES: Record<DebsnapErrorCode, number> = {
  COMMAND_FAILED: 1,
  MISSING_TOOL: 2,
  REPO_NOT_FOUND: 3,
  STAGING_INVALID: 4,
  STRAY_SOURCE: 5,
  VERIFICATION_FAILED: 6,
  NOT_ROOT: 7,
  INVENTORY_MISMATCH: 8,
  INDEX_FAILED: 9,
  UPDATE_FETCH_FAILED: 10,
  INVALID_TRANSITION: 11,
  QUARANTINE_FAILED: 12,
};

export interface DebsnapErrorOptions {
  /** 운영자가 복구에 사용할 경로 (예: 격리 디렉토리) */
  remediation?: string;
  context?: Record<string, unknown>;
  cause?: unknown;
}

export class DebsnapError extends Error {
  readonly code: DebsnapErrorCode;
  readonly exitCode: number;
  readonly remediation?: string;
  readonly context: Record<string, unknown>;

  constructor(code: DebsnapErrorCode, message: string, options: DebsnapErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'DebsnapError';
    this.code = code;
    this.exitCode = EXIT_CODES[code];
    this.remediation = options.remediation;
    this.context = options.context ?? {};
  }
}

/**
 * 필수 외부 명령이 실패했을 때
 */
export class CommandError extends DebsnapError {
  readonly command: string;
  readonly result: CommandResult;

  constructor(command: string, result: CommandResult, code: DebsnapErrorCode = 'COMMAND_FAILED') {
    const detail = result.stderr.trim() || result.stdout.trim();
    super(code, `${command} 실행 실패 (exit ${result.exitCode})${detail ? `: ${detail}` : ''}`, {
      context: { command, exitCode: result.exitCode },
    });
    this.name = 'CommandError';
    this.command = command;
    this.result = result;
  }
}

export function isDebsnapError(error: unknown): error is DebsnapError {
  return error instanceof DebsnapError;
}

/**
 * unknown 에러에서 메시지 추출
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
