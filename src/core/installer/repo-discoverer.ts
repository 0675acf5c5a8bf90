/**
 * 플랫 저장소 탐색
 * pool/ 디렉토리와 Packages 또는 Packages.gz가 같은 디렉토리에 있으면 후보로 본다.
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { DebsnapError, errorMessage } from '../errors';
import { getRelativePath, pathDepth } from '../shared/path-utils';
import logger from '../../utils/logger';

export const INDEX_FILENAMES = ['Packages', 'Packages.gz'] as const;

export interface DiscoveryResult {
  /** 선택된 저장소 (가장 얕은 후보, 같은 깊이면 경로순 첫 번째) */
  repoDir: string;
  /** 정렬된 전체 후보 */
  candidates: string[];
}

async function isFile(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isFile();
  } catch {
    return false;
  }
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * 디렉토리가 플랫 저장소 조건(pool + 인덱스)을 만족하는지
 */
export async function isFlatRepo(dir: string): Promise<boolean> {
  if (!(await isDirectory(path.join(dir, 'pool')))) return false;
  for (const name of INDEX_FILENAMES) {
    if (await isFile(path.join(dir, name))) return true;
  }
  return false;
}

/**
 * 후보 정렬: 깊이 오름차순, 같은 깊이는 상대 경로(forward slash) 코드 포인트 순
 */
export function rankCandidates(root: string, candidates: string[]): string[] {
  return [...candidates].sort((a, b) => {
    const relA = getRelativePath(a, root);
    const relB = getRelativePath(b, root);
    const depthDiff = pathDepth(relA) - pathDepth(relB);
    if (depthDiff !== 0) return depthDiff;
    return relA < relB ? -1 : relA > relB ? 1 : 0;
  });
}

/**
 * root 아래(자신 포함)를 재귀 탐색. 심볼릭 링크 디렉토리는 따라가지 않는다.
 */
export async function findRepoCandidates(root: string): Promise<string[]> {
  const candidates: string[] = [];

  const walk = async (dir: string): Promise<void> => {
    const candidate = await isFlatRepo(dir);
    if (candidate) {
      candidates.push(dir);
    }

    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (error) {
      logger.debug('디렉토리를 읽을 수 없어 건너뜁니다', { dir, error: errorMessage(error) });
      return;
    }

    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      // 저장소의 pool 안은 탐색하지 않음
      if (candidate && entry.name === 'pool') continue;
      await walk(path.join(dir, entry.name));
    }
  };

  await walk(path.resolve(root));
  return rankCandidates(path.resolve(root), candidates);
}

/**
 * 저장소 하나를 결정적으로 선택. 없으면 REPO_NOT_FOUND
 */
export async function discoverRepo(root: string): Promise<DiscoveryResult> {
  const candidates = await findRepoCandidates(root);
  if (candidates.length === 0) {
    throw new DebsnapError(
      'REPO_NOT_FOUND',
      `${path.resolve(root)} 아래에서 플랫 저장소를 찾지 못했습니다. 같은 디렉토리에 Packages 또는 Packages.gz와 pool/이 필요합니다.`,
      { context: { root: path.resolve(root) } }
    );
  }

  if (candidates.length > 1) {
    logger.warn('저장소 후보가 여러 개입니다. 가장 얕은 경로를 사용합니다', { candidates });
  }

  return { repoDir: candidates[0], candidates };
}
