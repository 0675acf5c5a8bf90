import chalk from 'chalk';
import { errorMessage, isDebsnapError } from '../core/errors';
import logger from '../utils/logger';

/**
 * 명령 실패 출력 후 에러 코드에 맞는 종료 코드로 종료
 */
export function exitWithError(error: unknown): never {
  if (isDebsnapError(error)) {
    logger.error(error.message, { code: error.code, remediation: error.remediation });
    console.error(chalk.red(`\n✗ [${error.code}] ${error.message}`));
    if (error.remediation) {
      console.error(chalk.yellow(`  복구 위치: ${error.remediation}`));
    }
    process.exit(error.exitCode);
  }

  console.error(chalk.red(`\n✗ 오류: ${errorMessage(error)}`));
  process.exit(1);
}

/**
 * --jobs 옵션 파싱
 */
export function parseJobsOption(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const jobs = Number(value);
  if (!Number.isInteger(jobs) || jobs < 1) {
    throw new Error(`--jobs는 1 이상의 정수여야 합니다: ${value}`);
  }
  return jobs;
}

/**
 * yes/no 옵션 파싱
 */
export function parseYesNo(value: string): boolean {
  if (value === 'yes') return true;
  if (value === 'no') return false;
  throw new Error(`yes 또는 no를 지정하세요: ${value}`);
}
