/**
 * 업그레이드 후 보고
 */

import type { CommandRunner } from '../shared/command-runner';
import { readSourceSet } from './sources';

export interface KernelImage {
  name: string;
  version: string;
}

export interface UpgradeReport {
  kernels: KernelImage[];
  activeSources: string[];
  logFile: string | null;
}

/**
 * `dpkg -l 'linux-image-*'` 출력에서 설치된(ii) 커널 이미지 추출
 */
export function parseKernelImages(output: string): KernelImage[] {
  const kernels: KernelImage[] = [];
  for (const line of output.split('\n')) {
    const parts = line.trim().split(/\s+/);
    if (parts[0] !== 'ii' || parts.length < 3) continue;
    kernels.push({ name: parts[1], version: parts[2] });
  }
  return kernels;
}

export async function buildUpgradeReport(
  runner: CommandRunner,
  aptDir: string,
  logFile: string | null
): Promise<UpgradeReport> {
  // 커널 목록은 정보용. 조회 실패는 빈 목록
  const result = await runner.run('dpkg', ['-l', 'linux-image-*']);
  const kernels = result.exitCode === 0 ? parseKernelImages(result.stdout) : [];
  const { entries } = await readSourceSet(aptDir);

  return {
    kernels,
    activeSources: entries.map((entry) => entry.raw),
    logFile,
  };
}
