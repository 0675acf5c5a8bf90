/**
 * 저장소 스테이징
 * 발견한 저장소를 고정 위치로 미러링하고 (_apt 사용자가 읽을 수 있도록) 권한을 조정한 뒤 다시 검증한다.
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { gunzipSync } from 'zlib';
import { DebsnapError, errorMessage } from '../errors';
import { isSameOrInside } from '../shared/path-utils';
import { isFlatRepo } from './repo-discoverer';
import logger from '../../utils/logger';

export interface StageResult {
  stagingDir: string;
  /** 새로 쓰거나 갱신한 파일 수 */
  copied: number;
  /** 변경 없어 건너뛴 파일 수 */
  unchanged: number;
  /** 원본에 없어 삭제한 항목 수 */
  removed: number;
}

/**
 * u+rwX,go+rX,go-w 적용 결과 모드
 */
export function readableMode(mode: number, isDir: boolean): number {
  let next = (mode & 0o777) | 0o644;
  if (isDir || (mode & 0o111) !== 0) {
    next |= 0o111;
  }
  return next & ~0o022;
}

/**
 * 크기와 수정 시각이 같으면 같은 파일로 본다 (rsync 기본 비교)
 */
async function isUnchanged(src: fs.Stats, dest: string): Promise<boolean> {
  try {
    const stat = await fs.lstat(dest);
    return stat.isFile() && stat.size === src.size && Math.floor(stat.mtimeMs) === Math.floor(src.mtimeMs);
  } catch {
    return false;
  }
}

/**
 * src → dest 미러링 (`rsync -a --delete`)
 */
async function mirrorDir(src: string, dest: string, result: StageResult): Promise<void> {
  await fs.ensureDir(dest);

  const srcEntries = await fs.promises.readdir(src, { withFileTypes: true });
  const srcNames = new Set(srcEntries.map((entry) => entry.name));

  // 원본에 없는 항목 삭제
  for (const name of await fs.readdir(dest)) {
    if (!srcNames.has(name)) {
      await fs.remove(path.join(dest, name));
      result.removed++;
    }
  }

  for (const entry of srcEntries) {
    const from = path.join(src, entry.name);
    const to = path.join(dest, entry.name);
    const destStat = await fs.lstat(to).catch(() => null);

    if (entry.isDirectory()) {
      if (destStat && !destStat.isDirectory()) {
        await fs.remove(to);
        result.removed++;
      }
      await mirrorDir(from, to, result);
    } else if (entry.isSymbolicLink()) {
      if (destStat) await fs.remove(to);
      await fs.symlink(await fs.readlink(from), to);
      result.copied++;
    } else if (entry.isFile()) {
      const stat = await fs.stat(from);
      if (destStat?.isDirectory()) {
        await fs.remove(to);
        result.removed++;
      } else if (await isUnchanged(stat, to)) {
        result.unchanged++;
        continue;
      }
      await fs.copyFile(from, to);
      await fs.utimes(to, stat.atime, stat.mtime);
      result.copied++;
    }
  }
}

/**
 * 스테이징 트리 전체 권한 조정 (chmod -R u+rwX,go+rX,go-w)
 */
async function fixPermissions(dir: string): Promise<void> {
  const stat = await fs.lstat(dir);
  if (stat.isSymbolicLink()) return;
  await fs.chmod(dir, readableMode(stat.mode, stat.isDirectory()));
  if (!stat.isDirectory()) return;

  for (const name of await fs.readdir(dir)) {
    await fixPermissions(path.join(dir, name));
  }
}

/**
 * 스테이징된 저장소 검증. 문제 목록 반환 (비어 있으면 정상)
 */
export async function verifyStagedRepo(dir: string): Promise<string[]> {
  const problems: string[] = [];

  if (!(await fs.pathExists(path.join(dir, 'pool')))) {
    problems.push('pool/ 디렉토리가 없습니다');
  }

  const packagesPath = path.join(dir, 'Packages');
  const packagesGzPath = path.join(dir, 'Packages.gz');
  const hasPackages = await fs.pathExists(packagesPath);
  const hasPackagesGz = await fs.pathExists(packagesGzPath);

  if (!hasPackages && !hasPackagesGz) {
    problems.push('Packages 또는 Packages.gz가 없습니다');
  }

  if (hasPackagesGz) {
    try {
      gunzipSync(await fs.readFile(packagesGzPath));
    } catch (error) {
      problems.push(`Packages.gz가 손상되었습니다: ${errorMessage(error)}`);
    }
  }

  if (problems.length === 0 && !(await isFlatRepo(dir))) {
    problems.push('플랫 저장소 구조가 아닙니다');
  }

  return problems;
}

/**
 * 저장소를 스테이징 위치로 복사하고 검증
 * 검증에 실패하면 STAGING_INVALID를 던지며, 소스 설정은 아직 건드리지 않은 상태다.
 */
export async function stageRepo(sourceDir: string, stagingDir: string): Promise<StageResult> {
  const source = path.resolve(sourceDir);
  const staging = path.resolve(stagingDir);
  const result: StageResult = { stagingDir: staging, copied: 0, unchanged: 0, removed: 0 };

  if (source === staging) {
    logger.info('저장소가 이미 스테이징 위치에 있습니다', { staging });
  } else if (isSameOrInside(staging, source) || isSameOrInside(source, staging)) {
    throw new DebsnapError('STAGING_INVALID', `스테이징 위치와 원본이 서로 포함 관계입니다: ${source} → ${staging}`, {
      context: { source, staging },
    });
  } else {
    logger.info(`저장소 스테이징: ${source}/ -> ${staging}/`);
    await mirrorDir(source, staging, result);
  }

  await fixPermissions(staging);

  const problems = await verifyStagedRepo(staging);
  if (problems.length > 0) {
    throw new DebsnapError('STAGING_INVALID', `스테이징된 저장소가 올바르지 않습니다: ${problems.join('; ')}`, {
      remediation: staging,
      context: { problems },
    });
  }

  logger.info('스테이징 완료', { ...result });
  return result;
}
