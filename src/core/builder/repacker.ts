/**
 * 설치 상태 → .deb 리팩 협력자
 */

import type { PackageRecord } from '../../types';
import type { CommandRunner } from '../shared/command-runner';
import { listDebFiles } from '../shared/file-utils';

export type RepackOutcome =
  | { ok: true; files: string[] }
  | { ok: false; detail: string };

export interface Repacker {
  /** 사용 가능 여부 (dpkg-repack 설치 여부) */
  isAvailable(): Promise<boolean>;
  /** workDir 안에 아카이브를 만든다 */
  repack(record: PackageRecord, workDir: string): Promise<RepackOutcome>;
}

/**
 * dpkg-repack 기반 리팩
 */
export class DpkgRepacker implements Repacker {
  constructor(private readonly runner: CommandRunner) {}

  isAvailable(): Promise<boolean> {
    return this.runner.which('dpkg-repack');
  }

  async repack(record: PackageRecord, workDir: string): Promise<RepackOutcome> {
    const result = await this.runner.run('dpkg-repack', [record.name], { cwd: workDir });
    if (result.exitCode !== 0) {
      const detail = (result.stderr.trim().split('\n').pop() ?? '') || `exit ${result.exitCode}`;
      return { ok: false, detail };
    }
    return { ok: true, files: await listDebFiles(workDir) };
  }
}
