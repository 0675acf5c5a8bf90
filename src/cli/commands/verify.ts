import chalk from 'chalk';
import * as fs from 'fs-extra';
import * as path from 'path';
import { getConfigManager } from '../../core/config';
import { DebsnapError } from '../../core/errors';
import { INVENTORY_FILENAME, verifyInventory } from '../../core/builder/inventory-auditor';
import { resolveJobs } from '../../core/shared/worker-pool';
import { exitWithError, parseJobsOption } from '../output';

export interface VerifyCommandOptions {
  repoDir?: string;
  jobs?: string;
}

/**
 * verify 명령어 핸들러 - 인벤토리 해시 재검증
 */
export async function verifyCommand(options: VerifyCommandOptions): Promise<void> {
  const config = getConfigManager().getConfig();

  try {
    const repoDir = path.resolve(options.repoDir ?? config.repoDir);
    if (!(await fs.pathExists(path.join(repoDir, INVENTORY_FILENAME)))) {
      throw new DebsnapError('REPO_NOT_FOUND', `${repoDir} 에 ${INVENTORY_FILENAME} 가 없습니다`);
    }

    const jobs = resolveJobs(parseJobsOption(options.jobs) ?? config.jobs ?? undefined);
    const result = await verifyInventory(repoDir, jobs);

    for (const mismatch of result.mismatched) {
      console.log(chalk.red(`✗ 해시 불일치: ${mismatch.relativePath}`));
      console.log(chalk.gray(`    기대값: ${mismatch.expected}`));
      console.log(chalk.gray(`    실제값: ${mismatch.actual}`));
    }
    for (const missing of result.missing) {
      console.log(chalk.red(`✗ 파일 없음: ${missing}`));
    }
    for (const unlisted of result.unlisted) {
      console.log(chalk.yellow(`! 인벤토리에 없음: ${unlisted}`));
    }

    const failed = result.mismatched.length + result.missing.length + result.unlisted.length;
    if (failed > 0) {
      throw new DebsnapError('INVENTORY_MISMATCH', `인벤토리 검증 실패: ${failed}건 / ${result.checked}개`, {
        remediation: repoDir,
      });
    }

    console.log(chalk.green(`✓ ${result.checked}개 파일 검증 완료`));
  } catch (error) {
    exitWithError(error);
  }
}
