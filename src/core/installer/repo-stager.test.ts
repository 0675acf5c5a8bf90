import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as path from 'path';
import { gzipSync } from 'zlib';
import { readableMode, stageRepo, verifyStagedRepo } from './repo-stager';
import { makeTempDir, writeTree } from '../../test-utils/tmp';

describe('repo-stager', () => {
  describe('readableMode', () => {
    it('파일은 0644, 실행 파일과 디렉토리는 0755', () => {
      expect(readableMode(0o600, false)).toBe(0o644);
      expect(readableMode(0o666, false)).toBe(0o644);
      expect(readableMode(0o700, false)).toBe(0o755);
      expect(readableMode(0o700, true)).toBe(0o755);
      expect(readableMode(0o777, true)).toBe(0o755);
    });
  });

  describe('stageRepo', () => {
    let tmp: string;
    let source: string;
    let staging: string;

    beforeEach(async () => {
      tmp = await makeTempDir();
      source = path.join(tmp, 'usb/repo');
      staging = path.join(tmp, 'opt/offline-repo');
      await writeTree(source, {
        'pool/a_1_all.deb': 'a',
        'pool/sub/b_1_all.deb': 'b',
        Packages: 'Package: a\n',
      });
      await fs.writeFile(path.join(source, 'Packages.gz'), gzipSync(Buffer.from('Package: a\n')));
    });

    afterEach(async () => {
      await fs.remove(tmp);
    });

    it('미러 복사 후 권한 조정', async () => {
      await fs.chmod(path.join(source, 'pool/a_1_all.deb'), 0o600);

      const result = await stageRepo(source, staging);

      expect(result).toEqual({ stagingDir: staging, copied: 4, unchanged: 0, removed: 0 });
      expect(await fs.readFile(path.join(staging, 'pool/sub/b_1_all.deb'), 'utf-8')).toBe('b');
      expect((await fs.stat(path.join(staging, 'pool/a_1_all.deb'))).mode & 0o777).toBe(0o644);
      expect((await fs.stat(path.join(staging, 'pool'))).mode & 0o777).toBe(0o755);
    });

    it('원본에 없는 파일은 스테이징에서 삭제하고 같은 파일은 건너뜀', async () => {
      await stageRepo(source, staging);
      await fs.writeFile(path.join(staging, 'pool/stale_1_all.deb'), 'old');
      await fs.remove(path.join(source, 'pool/sub'));

      const result = await stageRepo(source, staging);

      expect(result.removed).toBe(2);
      expect(result.unchanged).toBe(3);
      expect(result.copied).toBe(0);
      expect((await fs.readdir(path.join(staging, 'pool'))).sort()).toEqual(['a_1_all.deb']);
    });

    it('원본 안쪽으로 스테이징하면 STAGING_INVALID', async () => {
      await expect(stageRepo(source, path.join(source, 'staged'))).rejects.toMatchObject({
        code: 'STAGING_INVALID',
        exitCode: 4,
      });
      expect(await fs.pathExists(path.join(source, 'staged'))).toBe(false);
    });

    it('원본과 같은 위치면 복사 없이 검증만', async () => {
      const result = await stageRepo(source, source);
      expect(result).toEqual({ stagingDir: source, copied: 0, unchanged: 0, removed: 0 });
    });

    it('손상된 Packages.gz는 STAGING_INVALID', async () => {
      await fs.writeFile(path.join(source, 'Packages.gz'), 'not gzip');
      await expect(stageRepo(source, staging)).rejects.toMatchObject({
        code: 'STAGING_INVALID',
        remediation: staging,
      });
    });
  });

  describe('verifyStagedRepo', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await makeTempDir();
    });

    afterEach(async () => {
      await fs.remove(dir);
    });

    it('pool과 인덱스가 모두 없으면 문제 두 개', async () => {
      expect(await verifyStagedRepo(dir)).toEqual(['pool/ 디렉토리가 없습니다', 'Packages 또는 Packages.gz가 없습니다']);
    });

    it('Packages만 있어도 정상', async () => {
      await writeTree(dir, { 'pool/x.deb': '', Packages: '' });
      expect(await verifyStagedRepo(dir)).toEqual([]);
    });
  });
});
