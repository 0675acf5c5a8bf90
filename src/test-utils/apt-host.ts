/**
 * 임시 디렉토리에 만든 가짜 APT 호스트 (/etc/apt, /var/lib/apt/lists)
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { FakeCommandRunner } from './fakes';
import { makeTempDir, writeTree } from './tmp';

export interface FakeAptHost {
  root: string;
  aptDir: string;
  listsDir: string;
  stagingDir: string;
  runner: FakeCommandRunner;
  /** apt-get update 동작 변경 */
  updateBehavior: 'ok' | 'fail' | 'no-index';
  cleanup(): Promise<void>;
}

export const STAMP = '20240101T000000Z';

/**
 * 기존 소스 3개(sources.list, .sources, .list)가 있는 호스트
 * apt-get update 성공 시 목록 디렉토리에 Packages 인덱스를 하나 만든다.
 */
export async function createFakeAptHost(): Promise<FakeAptHost> {
  const root = await makeTempDir('debsnap-host-');
  const aptDir = path.join(root, 'etc/apt');
  const listsDir = path.join(root, 'var/lib/apt/lists');
  const stagingDir = path.join(root, 'opt/offline-repo');

  await writeTree(root, {
    'etc/apt/sources.list': 'deb http://archive.example/ubuntu jammy main\n',
    'etc/apt/sources.list.d/ubuntu.sources': 'Types: deb\nURIs: http://archive.example/ubuntu\nSuites: jammy\n',
    'etc/apt/sources.list.d/vendor.list': 'deb [signed-by=/k.gpg] https://vendor.example/apt stable main\n',
    'var/lib/apt/lists/archive.example_ubuntu_dists_jammy_main_binary-amd64_Packages': 'old',
    'var/lib/apt/lists/lock': '',
  });

  const host: FakeAptHost = {
    root,
    aptDir,
    listsDir,
    stagingDir,
    runner: new FakeCommandRunner(['dpkg', 'update-initramfs', 'update-grub']),
    updateBehavior: 'ok',
    cleanup: () => fs.remove(root),
  };

  host.runner.on('apt-get', async (args) => {
    if (args[0] !== 'update') return {};
    if (host.updateBehavior === 'fail') return { exitCode: 100, stderr: 'E: Failed to fetch' };
    if (host.updateBehavior === 'ok') {
      await fs.ensureDir(listsDir);
      await fs.writeFile(path.join(listsDir, '_opt_offline-repo_._Packages'), 'Package: a\n');
    }
    return { stdout: 'Reading package lists... Done\n' };
  });

  return host;
}
