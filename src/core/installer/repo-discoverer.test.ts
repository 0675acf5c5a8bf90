import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as path from 'path';
import { discoverRepo, findRepoCandidates, isFlatRepo, rankCandidates } from './repo-discoverer';
import { DebsnapError } from '../errors';
import { makeTempDir, writeTree } from '../../test-utils/tmp';

describe('repo-discoverer', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  it('pool/과 Packages 또는 Packages.gz가 있어야 후보', async () => {
    await writeTree(root, {
      'a/pool/x.deb': '',
      'a/Packages': '',
      'b/pool/x.deb': '',
      'b/Packages.gz': '',
      'c/Packages': '',
      'd/pool/x.deb': '',
    });

    expect(await isFlatRepo(path.join(root, 'a'))).toBe(true);
    expect(await isFlatRepo(path.join(root, 'b'))).toBe(true);
    expect(await isFlatRepo(path.join(root, 'c'))).toBe(false);
    expect(await isFlatRepo(path.join(root, 'd'))).toBe(false);
  });

  it('가장 얕은 후보, 같은 깊이면 경로순', async () => {
    await writeTree(root, {
      'usb/deep/repo/pool/x.deb': '',
      'usb/deep/repo/Packages': '',
      'zeta/pool/x.deb': '',
      'zeta/Packages.gz': '',
      'alpha/pool/x.deb': '',
      'alpha/Packages': '',
    });

    const result = await discoverRepo(root);

    expect(result.repoDir).toBe(path.join(root, 'alpha'));
    expect(result.candidates).toEqual([
      path.join(root, 'alpha'),
      path.join(root, 'zeta'),
      path.join(root, 'usb/deep/repo'),
    ]);
  });

  it('시작 위치 자체가 저장소일 수 있음', async () => {
    await writeTree(root, { 'pool/x.deb': '', Packages: '' });
    expect((await discoverRepo(root)).repoDir).toBe(root);
  });

  it('저장소의 pool 안은 탐색하지 않음', async () => {
    await writeTree(root, {
      'repo/Packages': '',
      'repo/pool/inner/Packages': '',
      'repo/pool/inner/pool/x.deb': '',
    });
    expect(await findRepoCandidates(root)).toEqual([path.join(root, 'repo')]);
  });

  it('심볼릭 링크 디렉토리는 따라가지 않음', async () => {
    const outside = await makeTempDir();
    try {
      await writeTree(outside, { 'pool/x.deb': '', Packages: '' });
      await fs.symlink(outside, path.join(root, 'link'));
      expect(await findRepoCandidates(root)).toEqual([]);
    } finally {
      await fs.remove(outside);
    }
  });

  it('후보가 없으면 REPO_NOT_FOUND', async () => {
    await writeTree(root, { 'docs/readme.txt': '' });
    const error = await discoverRepo(root).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DebsnapError);
    expect(error).toMatchObject({ code: 'REPO_NOT_FOUND', exitCode: 3 });
  });

  it('정렬은 코드 포인트 순', () => {
    expect(rankCandidates('/m', ['/m/b', '/m/B', '/m/a/x', '/m/_'])).toEqual(['/m/B', '/m/_', '/m/b', '/m/a/x']);
  });
});
