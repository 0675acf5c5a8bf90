/**
 * APT 캐시의 .deb를 풀로 복사 (빠른 경로)
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { copyNoClobber } from '../shared/file-utils';
import logger from '../../utils/logger';

export interface HarvestResult {
  copied: number;
  existing: number;
}

/**
 * 캐시 디렉토리 최상위의 *.deb를 덮어쓰지 않고 복사
 * 캐시가 없거나 비어 있어도 에러가 아님
 */
export async function harvestCache(cacheDir: string, poolDir: string): Promise<HarvestResult> {
  const result: HarvestResult = { copied: 0, existing: 0 };

  if (!(await fs.pathExists(cacheDir))) {
    logger.info('APT 캐시 디렉토리가 없습니다', { cacheDir });
    return result;
  }

  await fs.ensureDir(poolDir);
  const names = (await fs.readdir(cacheDir)).filter((name) => name.endsWith('.deb')).sort();

  for (const name of names) {
    const src = path.join(cacheDir, name);
    if (!(await fs.stat(src)).isFile()) continue;

    const outcome = await copyNoClobber(src, path.join(poolDir, name));
    if (outcome === 'written') {
      result.copied++;
    } else {
      result.existing++;
    }
  }

  logger.info('캐시 수집 완료', { cacheDir, ...result });
  return result;
}
