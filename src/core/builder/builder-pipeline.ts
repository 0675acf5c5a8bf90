/**
 * 빌더 파이프라인
 * UpdateFetcher(선택) → CacheHarvester → ReconciliationEngine → IndexGenerator → InventoryAuditor → RepoRegistrar(선택)
 */

import { EventEmitter } from 'eventemitter3';
import * as fs from 'fs-extra';
import * as path from 'path';
import type { ReconcileResult, ReconciliationSummary } from '../../types';
import { requireTools, type CommandRunner } from '../shared/command-runner';
import type { DebInspector } from '../shared/deb-control';
import { resolveJobs } from '../shared/worker-pool';
import { fetchUpdates } from './update-fetcher';
import { harvestCache, type HarvestResult } from './cache-harvester';
import { queryInstalledPackages } from './host-packages';
import { ReconciliationEngine } from './reconciliation-engine';
import type { Repacker } from './repacker';
import { generateIndex, type IndexResult } from './index-generator';
import { auditInventory, type InventoryReport } from './inventory-auditor';
import { registerRepo } from './repo-registrar';
import logger from '../../utils/logger';

export type BuildStage = 'fetch' | 'harvest' | 'query' | 'reconcile' | 'index' | 'audit' | 'register';

export interface BuildOptions {
  repoDir: string;
  cacheDir: string;
  includeUpdates: boolean;
  register: boolean;
  trusted: boolean;
  /** 등록 시 사용할 APT 설정 루트 */
  aptDir: string;
  jobs?: number;
}

export interface BuildReport {
  repoDir: string;
  installedCount: number;
  harvest: HarvestResult;
  reconciliation: ReconciliationSummary;
  index: IndexResult;
  inventory: InventoryReport;
  registeredList: string | null;
}

export interface BuilderEvents {
  stage: (stage: BuildStage) => void;
  itemComplete: (result: ReconcileResult, completed: number, total: number) => void;
  auditProgress: (completed: number, total: number) => void;
}

export interface BuilderDeps {
  runner: CommandRunner;
  inspector: DebInspector;
  repacker: Repacker;
}

export class BuilderPipeline extends EventEmitter<BuilderEvents> {
  constructor(private readonly deps: BuilderDeps) {
    super();
  }

  async run(options: BuildOptions): Promise<BuildReport> {
    const { runner } = this.deps;
    const repoDir = path.resolve(options.repoDir);
    const poolDir = path.join(repoDir, 'pool');
    const concurrency = resolveJobs(options.jobs);

    const tools = ['dpkg-query', 'dpkg-deb', 'apt-ftparchive'];
    if (options.includeUpdates || options.register) tools.push('apt-get');
    await requireTools(runner, tools);

    if (options.includeUpdates) {
      this.emit('stage', 'fetch');
      await fetchUpdates(runner);
    }

    await fs.ensureDir(poolDir);

    this.emit('stage', 'harvest');
    const harvest = await harvestCache(options.cacheDir, poolDir);

    this.emit('stage', 'query');
    const records = await queryInstalledPackages(runner);
    logger.info('설치 패키지 조회 완료', { count: records.length });

    this.emit('stage', 'reconcile');
    const engine = new ReconciliationEngine(this.deps.inspector, this.deps.repacker);
    engine.on('itemComplete', (result, completed, total) => this.emit('itemComplete', result, completed, total));
    const reconciliation = await engine.reconcile(records, { poolDir, concurrency });

    this.emit('stage', 'index');
    const index = await generateIndex(runner, repoDir);

    this.emit('stage', 'audit');
    const inventory = await auditInventory(this.deps.inspector, repoDir, {
      concurrency,
      onProgress: (completed, total) => this.emit('auditProgress', completed, total),
    });

    let registeredList: string | null = null;
    if (options.register) {
      this.emit('stage', 'register');
      registeredList = await registerRepo(runner, {
        repoDir,
        aptDir: options.aptDir,
        trusted: options.trusted,
      });
    }

    return {
      repoDir,
      installedCount: records.length,
      harvest,
      reconciliation,
      index,
      inventory,
      registeredList,
    };
  }
}
