/**
 * 플랫 저장소 인덱스 생성 (Packages, Packages.gz, Release)
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import * as zlib from 'zlib';
import { promisify } from 'util';
import { runChecked, type CommandRunner } from '../shared/command-runner';
import { errorMessage } from '../errors';
import logger from '../../utils/logger';

const gzip = promisify(zlib.gzip);

export interface IndexResult {
  packagesPath: string;
  packagesGzPath: string;
  /** Release 생성에 실패하면 null (선택 산출물) */
  releasePath: string | null;
  /** Packages에 기록된 패키지 스탠자 수 */
  entryCount: number;
}

/**
 * Packages 텍스트의 스탠자 수
 */
export function countIndexEntries(packagesText: string): number {
  return packagesText.split('\n').filter((line) => line.startsWith('Package:')).length;
}

/**
 * 저장소 루트에서 ./pool 기준 인덱스 생성
 */
export async function generateIndex(runner: CommandRunner, repoDir: string): Promise<IndexResult> {
  const packagesPath = path.join(repoDir, 'Packages');
  const packagesGzPath = path.join(repoDir, 'Packages.gz');
  const releasePath = path.join(repoDir, 'Release');

  const packages = await runChecked(
    runner,
    'apt-ftparchive',
    ['packages', './pool'],
    { cwd: repoDir },
    'INDEX_FAILED'
  );
  await fs.writeFile(packagesPath, packages.stdout, 'utf-8');
  await fs.writeFile(packagesGzPath, await gzip(Buffer.from(packages.stdout, 'utf-8')));

  // Release는 서명하지 않는 최소 요약. 실패해도 저장소는 사용 가능
  let writtenRelease: string | null = releasePath;
  await fs.remove(releasePath);
  try {
    const release = await runChecked(runner, 'apt-ftparchive', ['release', repoDir], { cwd: repoDir });
    await fs.writeFile(releasePath, release.stdout, 'utf-8');
  } catch (error) {
    logger.warn('Release 생성 실패 (계속 진행)', { error: errorMessage(error) });
    writtenRelease = null;
  }

  const entryCount = countIndexEntries(packages.stdout);
  logger.info('인덱스 생성 완료', { repoDir, entryCount });

  return { packagesPath, packagesGzPath, releasePath: writtenRelease, entryCount };
}
