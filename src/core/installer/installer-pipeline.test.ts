import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs-extra';
import * as path from 'path';
import { InstallerPipeline, type InstallOptions, type InstallStage } from './installer-pipeline';
import { createFakeAptHost, STAMP, type FakeAptHost } from '../../test-utils/apt-host';
import { writeTree } from '../../test-utils/tmp';

describe('InstallerPipeline', () => {
  let host: FakeAptHost;
  let options: InstallOptions;

  beforeEach(async () => {
    host = await createFakeAptHost();
    await writeTree(host.root, {
      'media/usb/offline-repo/pool/a_1_all.deb': 'a',
      'media/usb/offline-repo/Packages': 'Package: a\n',
    });
    options = {
      searchRoot: path.join(host.root, 'media'),
      stagingDir: host.stagingDir,
      aptDir: host.aptDir,
      listsDir: host.listsDir,
      logDir: null,
      trusted: true,
      desktopMeta: null,
      stamp: STAMP,
    };
  });

  afterEach(async () => {
    await host.cleanup();
  });

  it('root가 아니면 아무것도 하지 않고 NOT_ROOT', async () => {
    const pipeline = new InstallerPipeline({ runner: host.runner, isRoot: () => false });

    await expect(pipeline.run(options)).rejects.toMatchObject({ code: 'NOT_ROOT', exitCode: 7 });
    expect(host.runner.calls).toEqual([]);
    expect(await fs.pathExists(host.stagingDir)).toBe(false);
  });

  it('탐색 → 스테이징 → 전환 → 업그레이드 → 보고', async () => {
    const pipeline = new InstallerPipeline({ runner: host.runner, isRoot: () => true });
    const stages: InstallStage[] = [];
    pipeline.on('stage', (stage) => stages.push(stage));

    const report = await pipeline.run(options);

    expect(stages).toEqual(['discover', 'stage', 'switch', 'upgrade', 'report']);
    expect(report.repoDir).toBe(path.join(host.root, 'media/usb/offline-repo'));
    expect(await fs.readFile(path.join(host.stagingDir, 'pool/a_1_all.deb'), 'utf-8')).toBe('a');
    expect(report.quarantine.quarantineDir).toBe(path.join(host.aptDir, `sources.backup.${STAMP}`));
    expect(report.history.map((t) => t.to)).toEqual(['QUARANTINED', 'SWITCHED', 'VERIFIED']);
    expect(report.report.activeSources).toEqual([`deb [trusted=yes] file:${host.stagingDir} ./`]);
    expect(report.report.logFile).toBeNull();
    expect(pipeline.getSourceSwitch()?.getState()).toBe('VERIFIED');
  });

  it('logDir가 있으면 실행 로그 파일을 남기고 보고서에 경로를 담음', async () => {
    const logDir = path.join(host.root, 'var/log');
    const pipeline = new InstallerPipeline({ runner: host.runner, isRoot: () => true });

    const report = await pipeline.run({ ...options, logDir });

    const logFile = path.join(logDir, `offline-upgrade-${STAMP}.log`);
    expect(report.report.logFile).toBe(logFile);
    await vi.waitFor(async () => {
      const text = await fs.readFile(logFile, 'utf-8');
      expect(text).toContain(`INFO  오프라인 업그레이드 시작 {"logFile":"${logFile}"}`);
      expect(text).toContain('INFO  Reading package lists... Done');
      expect(text).toContain('INFO  오프라인 업그레이드 완료');
    });
  });

  it('저장소가 없으면 소스를 건드리지 않고 REPO_NOT_FOUND', async () => {
    await fs.remove(path.join(host.root, 'media'));
    await fs.ensureDir(path.join(host.root, 'media'));
    const pipeline = new InstallerPipeline({ runner: host.runner, isRoot: () => true });

    await expect(pipeline.run(options)).rejects.toMatchObject({ code: 'REPO_NOT_FOUND' });
    expect(await fs.readFile(path.join(host.aptDir, 'sources.list'), 'utf-8')).toBe(
      'deb http://archive.example/ubuntu jammy main\n'
    );
  });

  it('검증 실패 시 업그레이드 명령을 실행하지 않음', async () => {
    host.updateBehavior = 'fail';
    const pipeline = new InstallerPipeline({ runner: host.runner, isRoot: () => true });

    await expect(pipeline.run(options)).rejects.toMatchObject({ code: 'VERIFICATION_FAILED' });
    expect(host.runner.commandLines().some((line) => line.includes('full-upgrade'))).toBe(false);
    expect(pipeline.getSourceSwitch()?.getState()).toBe('FAILED');
  });

  it('필수 도구가 없으면 MISSING_TOOL', async () => {
    host.runner.withoutTools('dpkg');
    const pipeline = new InstallerPipeline({ runner: host.runner, isRoot: () => true });
    await expect(pipeline.run(options)).rejects.toMatchObject({ code: 'MISSING_TOOL' });
  });
});
