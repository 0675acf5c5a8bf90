/**
 * 빌드한 저장소를 빌드 호스트의 APT 소스로 등록 (선택 단계)
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { runChecked, type CommandRunner } from '../shared/command-runner';
import { formatSourceLine } from '../installer/sources';
import logger from '../../utils/logger';

export const REGISTERED_LIST_NAME = 'offline-repo.list';

export interface RegisterOptions {
  repoDir: string;
  aptDir: string;
  trusted: boolean;
}

/**
 * sources.list.d/offline-repo.list 작성 후 apt-get update
 * 기존 소스는 건드리지 않는다.
 */
export async function registerRepo(runner: CommandRunner, options: RegisterOptions): Promise<string> {
  const listDir = path.join(options.aptDir, 'sources.list.d');
  const listPath = path.join(listDir, REGISTERED_LIST_NAME);
  const line = formatSourceLine(path.resolve(options.repoDir), options.trusted);

  await fs.ensureDir(listDir);
  await fs.writeFile(listPath, line + '\n', 'utf-8');
  logger.info('로컬 저장소 등록', { listPath, line });

  await runChecked(runner, 'apt-get', ['update'], { env: { DEBIAN_FRONTEND: 'noninteractive' } });
  return listPath;
}
