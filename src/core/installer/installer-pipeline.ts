/**
 * 설치 파이프라인
 * RepoDiscoverer → RepoStager → SourceSwitch (격리 + 검증) → UpgradeDriver → PostUpgradeReporter
 *
 * 소스 전환 이후의 실패에는 자동 롤백이 없다. 에러의 remediation에 격리 디렉토리가 담긴다.
 */

import { EventEmitter } from 'eventemitter3';
import * as fs from 'fs-extra';
import * as path from 'path';
import type { SwitchTransition } from '../../types';
import { DebsnapError } from '../errors';
import { requireTools, type CommandRunner } from '../shared/command-runner';
import { utcStamp } from '../shared/path-utils';
import { discoverRepo } from './repo-discoverer';
import { stageRepo, type StageResult } from './repo-stager';
import { SourceSwitch, type QuarantineResult } from './source-switch';
import { UpgradeDriver, type UpgradeStep } from './upgrade-driver';
import { buildUpgradeReport, type UpgradeReport } from './post-upgrade-reporter';
import logger, { type RunLog } from '../../utils/logger';

export type InstallStage = 'discover' | 'stage' | 'switch' | 'upgrade' | 'report';

export interface InstallOptions {
  /** 저장소 탐색 시작 위치 */
  searchRoot: string;
  stagingDir: string;
  aptDir: string;
  listsDir: string;
  /** 실행 로그(offline-upgrade-<stamp>.log) 디렉토리. null이면 기록하지 않음 */
  logDir: string | null;
  trusted: boolean;
  desktopMeta: string | null;
  stamp?: string;
}

export interface InstallReport {
  repoDir: string;
  candidates: string[];
  staging: StageResult;
  quarantine: QuarantineResult;
  history: SwitchTransition[];
  steps: UpgradeStep[];
  report: UpgradeReport;
}

export interface InstallerEvents {
  stage: (stage: InstallStage) => void;
  output: (chunk: string) => void;
  step: (step: UpgradeStep) => void;
}

export interface InstallerDeps {
  runner: CommandRunner;
  /** root 권한 확인 (테스트에서 대체) */
  isRoot?: () => boolean;
}

function processIsRoot(): boolean {
  return typeof process.getuid === 'function' && process.getuid() === 0;
}

export class InstallerPipeline extends EventEmitter<InstallerEvents> {
  private sourceSwitch: SourceSwitch | null = null;

  constructor(private readonly deps: InstallerDeps) {
    super();
  }

  /** 마지막 실행의 소스 전환 상태 머신 */
  getSourceSwitch(): SourceSwitch | null {
    return this.sourceSwitch;
  }

  async run(options: InstallOptions): Promise<InstallReport> {
    const { runner } = this.deps;
    const isRoot = this.deps.isRoot ?? processIsRoot;

    if (!isRoot()) {
      throw new DebsnapError('NOT_ROOT', 'root 권한으로 실행해야 합니다 (sudo debsnap install)');
    }
    await requireTools(runner, ['apt-get', 'dpkg']);

    const stamp = options.stamp ?? utcStamp();
    let runLog: RunLog | null = null;
    if (options.logDir) {
      await fs.ensureDir(options.logDir);
      runLog = logger.openRunLog(path.join(options.logDir, `offline-upgrade-${stamp}.log`));
      logger.info('오프라인 업그레이드 시작', { logFile: runLog.file });
    }

    try {
      return await this.runStages(options, stamp, runLog?.file ?? null);
    } finally {
      runLog?.close();
    }
  }

  private async runStages(options: InstallOptions, stamp: string, logFile: string | null): Promise<InstallReport> {
    const { runner } = this.deps;

    const onOutput = (chunk: string): void => {
      const text = chunk.trimEnd();
      if (text) logger.info(text);
      this.emit('output', chunk);
    };

    this.emit('stage', 'discover');
    const { repoDir, candidates } = await discoverRepo(options.searchRoot);
    logger.info('저장소 발견', { repoDir });

    this.emit('stage', 'stage');
    const staging = await stageRepo(repoDir, options.stagingDir);

    this.emit('stage', 'switch');
    const sourceSwitch = new SourceSwitch(runner, {
      aptDir: options.aptDir,
      listsDir: options.listsDir,
      stagingDir: staging.stagingDir,
      trusted: options.trusted,
      stamp,
      onOutput,
    });
    this.sourceSwitch = sourceSwitch;
    const quarantine = await sourceSwitch.run();

    this.emit('stage', 'upgrade');
    const driver = new UpgradeDriver(runner, sourceSwitch, {
      desktopMeta: options.desktopMeta,
      onOutput,
      onStep: (step) => this.emit('step', step),
    });
    const steps = await driver.run();

    this.emit('stage', 'report');
    const report = await buildUpgradeReport(runner, options.aptDir, logFile);
    logger.info('오프라인 업그레이드 완료', { kernels: report.kernels.length });

    return {
      repoDir,
      candidates,
      staging,
      quarantine,
      history: [...sourceSwitch.history],
      steps,
      report,
    };
  }
}
