import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as path from 'path';
import type { PackageRecord, ReconcileResult } from '../../types';
import { ReconciliationEngine, buildPoolIndex } from './reconciliation-engine';
import { FakeDebInspector, FakeRepacker, writeFakeDeb } from '../../test-utils/fakes';
import { makeTempDir } from '../../test-utils/tmp';

const rec = (name: string, version: string, architecture = 'amd64'): PackageRecord => ({ name, version, architecture });

function statusOf(results: ReconcileResult[], name: string): string | undefined {
  return results.find((r) => r.record.name === name)?.status;
}

describe('ReconciliationEngine', () => {
  let repoDir: string;
  let poolDir: string;

  beforeEach(async () => {
    repoDir = await makeTempDir();
    poolDir = path.join(repoDir, 'pool');
    await fs.ensureDir(poolDir);
  });

  afterEach(async () => {
    await fs.remove(repoDir);
  });

  it('풀에 있는 패키지는 유지하고 없는 패키지만 리팩', async () => {
    await writeFakeDeb(path.join(poolDir, 'alpha_1.0_amd64.deb'), { name: 'alpha', version: '1.0', architecture: 'amd64' });
    const repacker = new FakeRepacker();
    const engine = new ReconciliationEngine(new FakeDebInspector(), repacker);

    const summary = await engine.reconcile([rec('beta', '2.0'), rec('alpha', '1.0')], { poolDir, concurrency: 2 });

    expect(summary.present).toBe(1);
    expect(summary.repacked).toBe(1);
    expect(summary.skipped).toBe(0);
    expect(repacker.repacked).toEqual(['beta']);
    expect(summary.results[0]).toEqual({
      status: 'present',
      record: rec('alpha', '1.0'),
      path: path.join(poolDir, 'alpha_1.0_amd64.deb'),
      tier: 'exact',
    });
    expect(summary.results[1]).toEqual({
      status: 'repacked',
      record: rec('beta', '2.0'),
      path: path.join(poolDir, 'beta_2.0_amd64.deb'),
    });
    expect((await fs.readdir(poolDir)).sort()).toEqual(['alpha_1.0_amd64.deb', 'beta_2.0_amd64.deb']);
  });

  it('두 번째 실행에서는 아무것도 리팩하지 않음', async () => {
    const records = [rec('alpha', '1.0'), rec('beta', '1:2.0', 'all')];
    const engine = new ReconciliationEngine(new FakeDebInspector(), new FakeRepacker());
    await engine.reconcile(records, { poolDir, concurrency: 2 });

    const secondRepacker = new FakeRepacker();
    const summary = await new ReconciliationEngine(new FakeDebInspector(), secondRepacker).reconcile(records, {
      poolDir,
      concurrency: 2,
    });

    expect(secondRepacker.repacked).toEqual([]);
    expect(summary.present).toBe(2);
    expect((await fs.readdir(poolDir)).sort()).toEqual(['alpha_1.0_amd64.deb', 'beta_2.0_all.deb']);
  });

  it('epoch를 %3a로 인코딩한 캐시 파일명도 정확 일치', async () => {
    const file = await writeFakeDeb(path.join(poolDir, 'libfoo_2%3a3.0_amd64.deb'), {
      name: 'libfoo',
      version: '2:3.0',
      architecture: 'amd64',
    });
    const engine = new ReconciliationEngine(new FakeDebInspector(), new FakeRepacker());
    const summary = await engine.reconcile([rec('libfoo:amd64', '2:3.0')], { poolDir, concurrency: 1 });

    expect(summary.results[0]).toMatchObject({ status: 'present', path: file, tier: 'exact' });
  });

  it('다른 이름 규칙의 파일은 메타데이터 확인 후 fallback 일치', async () => {
    const file = await writeFakeDeb(path.join(poolDir, 'gamma_custom-build.deb'), {
      name: 'gamma',
      version: '1.0-1',
      architecture: 'amd64',
    });
    const repacker = new FakeRepacker();
    const engine = new ReconciliationEngine(new FakeDebInspector(), repacker);
    const summary = await engine.reconcile([rec('gamma', '1.0-1')], { poolDir, concurrency: 1 });

    expect(summary.results[0]).toMatchObject({ status: 'present', path: file, tier: 'fallback' });
    expect(repacker.repacked).toEqual([]);
  });

  it('버전 문자열이 포함만 되는 파일은 일치로 보지 않음', async () => {
    await writeFakeDeb(path.join(poolDir, 'delta_1.0-10_amd64.deb'), {
      name: 'delta',
      version: '1.0-10',
      architecture: 'amd64',
    });
    const repacker = new FakeRepacker();
    const engine = new ReconciliationEngine(new FakeDebInspector(), repacker);
    const summary = await engine.reconcile([rec('delta', '1.0-1')], { poolDir, concurrency: 1 });

    expect(statusOf(summary.results, 'delta')).toBe('repacked');
    expect(repacker.repacked).toEqual(['delta']);
    expect((await fs.readdir(poolDir)).sort()).toEqual(['delta_1.0-10_amd64.deb', 'delta_1.0-1_amd64.deb']);
  });

  it('접두사만 같은 다른 패키지는 후보가 아님', async () => {
    await writeFakeDeb(path.join(poolDir, 'foo-utils_1.0_amd64.deb'), {
      name: 'foo-utils',
      version: '1.0',
      architecture: 'amd64',
    });
    const index = await buildPoolIndex(poolDir);
    expect(index.get('foo')).toBeUndefined();
    expect(index.get('foo-utils')).toEqual([path.join(poolDir, 'foo-utils_1.0_amd64.deb')]);
  });

  it('리팩 실패는 건너뛰고 나머지는 계속', async () => {
    const repacker = new FakeRepacker()
      .setBehavior('virtual-pkg', { kind: 'fail', detail: 'not installed' })
      .setBehavior('empty-pkg', { kind: 'empty' })
      .setBehavior('crash-pkg', { kind: 'throw', message: 'disk full' });
    const engine = new ReconciliationEngine(new FakeDebInspector(), repacker);

    const summary = await engine.reconcile(
      [rec('virtual-pkg', '1'), rec('empty-pkg', '1'), rec('crash-pkg', '1'), rec('real-pkg', '1')],
      { poolDir, concurrency: 2 }
    );

    expect(summary.repacked).toBe(1);
    expect(summary.skipped).toBe(3);
    expect(summary.failed).toBe(1);
    const skipped = summary.results.filter((r) => r.status === 'skipped');
    expect(skipped.map((r) => (r.status === 'skipped' ? [r.record.name, r.reason, r.detail] : []))).toEqual([
      ['crash-pkg', 'worker-error', 'disk full'],
      ['empty-pkg', 'no-archive-produced', 'repack produced no .deb'],
      ['virtual-pkg', 'repack-failed', 'not installed'],
    ]);
    expect(await fs.readdir(poolDir)).toEqual(['real-pkg_1_amd64.deb']);
  });

  it('리팩 도구가 없으면 없는 패키지를 사유와 함께 건너뜀', async () => {
    await writeFakeDeb(path.join(poolDir, 'alpha_1.0_amd64.deb'), { name: 'alpha', version: '1.0', architecture: 'amd64' });
    const repacker = new FakeRepacker(false);
    const engine = new ReconciliationEngine(new FakeDebInspector(), repacker);

    const summary = await engine.reconcile([rec('alpha', '1.0'), rec('beta', '1.0')], { poolDir, concurrency: 1 });

    expect(summary.present).toBe(1);
    expect(summary.results[1]).toEqual({
      status: 'skipped',
      record: rec('beta', '1.0'),
      reason: 'repack-unavailable',
      detail: 'dpkg-repack not installed',
    });
    expect(repacker.repacked).toEqual([]);
  });

  it('같은 파일명을 만드는 동시 리팩은 하나만 풀에 기록', async () => {
    const engine = new ReconciliationEngine(new FakeDebInspector(), new FakeRepacker());
    const summary = await engine.reconcile([rec('zeta', '1.0'), rec('zeta:amd64', '1.0')], { poolDir, concurrency: 2 });

    // 먼저 끝난 워커의 파일을 다른 워커가 발견하면 present로 끝날 수 있음
    expect(summary.skipped).toBe(0);
    expect(summary.present + summary.repacked).toBe(2);
    expect(await fs.readdir(poolDir)).toEqual(['zeta_1.0_amd64.deb']);
  });

  it('같은 이름의 다른 내용 파일이 풀에 있으면 덮어쓰지 않고 건너뜀', async () => {
    const occupied = path.join(poolDir, 'foo_1.0_amd64.deb');
    await fs.writeFile(occupied, 'garbage', 'utf-8');
    const repacker = new FakeRepacker();
    const engine = new ReconciliationEngine(new FakeDebInspector(), repacker);

    const summary = await engine.reconcile([rec('foo', '1.0')], { poolDir, concurrency: 1 });

    expect(repacker.repacked).toEqual(['foo']);
    expect(summary.results[0]).toEqual({
      status: 'skipped',
      record: rec('foo', '1.0'),
      reason: 'pool-name-conflict',
      detail: 'foo_1.0_amd64.deb already in pool with different metadata',
    });
    expect(summary.repacked).toBe(0);
    expect(summary.failed).toBe(1);
    expect(await fs.readdir(poolDir)).toEqual(['foo_1.0_amd64.deb']);
    expect(await fs.readFile(occupied, 'utf-8')).toBe('garbage');
  });

  it('리팩 결과가 레코드와 맞지 않으면 풀에 넣지 않음', async () => {
    const repacker = new FakeRepacker().setBehavior('eta', { kind: 'mismatch', version: '9.9' });
    const engine = new ReconciliationEngine(new FakeDebInspector(), repacker);

    const summary = await engine.reconcile([rec('eta', '1.0')], { poolDir, concurrency: 1 });

    expect(summary.results[0]).toEqual({
      status: 'skipped',
      record: rec('eta', '1.0'),
      reason: 'no-archive-produced',
      detail: 'repack output does not match eta 1.0 amd64',
    });
    expect(summary.failed).toBe(0);
    expect(await fs.readdir(poolDir)).toEqual([]);
  });

  it('리팩 작업 디렉토리를 정리하고 진행 이벤트를 보냄', async () => {
    const engine = new ReconciliationEngine(new FakeDebInspector(), new FakeRepacker());
    const progress: string[] = [];
    engine.on('itemComplete', (_result, completed, total) => progress.push(`${completed}/${total}`));

    await engine.reconcile([rec('a', '1'), rec('b', '1'), rec('c', '1')], { poolDir, concurrency: 1 });

    expect(progress).toEqual(['1/3', '2/3', '3/3']);
    expect(await fs.pathExists(path.join(repoDir, '.repack-work'))).toBe(false);
  });
});
