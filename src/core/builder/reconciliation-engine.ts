/**
 * 설치/보유 재조정 엔진
 * 호스트 설치 패키지마다 풀에 대응하는 아카이브가 있는지 판정하고, 없는 것만 리팩한다.
 */

import { EventEmitter } from 'eventemitter3';
import * as fs from 'fs-extra';
import * as path from 'path';
import type { PackageRecord, ReconcileResult, ReconciliationSummary, MatchTier, SkipReason } from '../../types';
import {
  basePackageName,
  canonicalDebFilenames,
  debFilenamePackage,
  identityMatches,
  type DebInspector,
} from '../shared/deb-control';
import { listDebFiles, moveNoClobber } from '../shared/file-utils';
import { runBounded } from '../shared/worker-pool';
import { errorMessage } from '../errors';
import type { Repacker } from './repacker';
import { sortRecords } from './host-packages';
import logger from '../../utils/logger';

export interface ReconciliationOptions {
  /** 풀 디렉토리 */
  poolDir: string;
  /** 리팩 임시 디렉토리. 풀과 같은 파일시스템이어야 원자적 이동이 가능 */
  workDir?: string;
  /** 워커 수 */
  concurrency: number;
}

export interface ReconciliationEvents {
  itemComplete: (result: ReconcileResult, completed: number, total: number) => void;
}

export interface ExistingMatch {
  path: string;
  tier: MatchTier;
}

/**
 * 패키지명 → 풀 안의 후보 파일 목록 (실행 시작 시점의 스냅샷)
 */
export type PoolIndex = Map<string, string[]>;

export async function buildPoolIndex(poolDir: string): Promise<PoolIndex> {
  const index: PoolIndex = new Map();
  for (const file of await listDebFiles(poolDir)) {
    const name = debFilenamePackage(path.basename(file));
    if (!name) continue;
    const list = index.get(name) ?? [];
    list.push(file);
    index.set(name, list);
  }
  return index;
}

export class ReconciliationEngine extends EventEmitter<ReconciliationEvents> {
  constructor(
    private readonly inspector: DebInspector,
    private readonly repacker: Repacker
  ) {
    super();
  }

  /**
   * 전체 재조정 실행. 개별 패키지 실패로 배치를 중단하지 않는다.
   */
  async reconcile(records: PackageRecord[], options: ReconciliationOptions): Promise<ReconciliationSummary> {
    const { poolDir } = options;
    const workRoot = options.workDir ?? path.join(path.dirname(poolDir), '.repack-work');
    const sorted = sortRecords(records);

    await fs.ensureDir(poolDir);
    const index = await buildPoolIndex(poolDir);
    const repackAvailable = await this.repacker.isAvailable();

    if (!repackAvailable) {
      logger.warn('dpkg-repack이 없어 리팩 단계를 건너뜁니다 (sudo apt-get install dpkg-repack)');
    }

    logger.info('재조정 시작', {
      packages: sorted.length,
      poolFiles: [...index.values()].reduce((sum, files) => sum + files.length, 0),
      concurrency: options.concurrency,
    });

    await fs.ensureDir(workRoot);
    let results: ReconcileResult[];
    try {
      results = await runBounded(
        sorted,
        (record) => this.reconcileOne(record, poolDir, workRoot, index, repackAvailable),
        {
          concurrency: options.concurrency,
          onError: (error, record): ReconcileResult => ({
            status: 'skipped',
            record,
            reason: 'worker-error',
            detail: errorMessage(error),
          }),
          onSettled: (result, completed, total) => {
            this.emit('itemComplete', result, completed, total);
          },
        }
      );
    } finally {
      await fs.remove(workRoot);
    }

    const summary = summarize(results);
    logger.info('재조정 완료', {
      present: summary.present,
      repacked: summary.repacked,
      skipped: summary.skipped,
      failed: summary.failed,
    });
    return summary;
  }

  /**
   * 풀에서 레코드를 뒷받침하는 아카이브 찾기
   * 1단계: 정규 파일명 존재 확인, 2단계: `name_*.deb` 후보. 두 단계 모두 내장 메타데이터로 확인한다.
   */
  async findExisting(record: PackageRecord, poolDir: string, index: PoolIndex): Promise<ExistingMatch | null> {
    const checked = new Set<string>();

    for (const filename of canonicalDebFilenames(record)) {
      const candidate = path.join(poolDir, filename);
      checked.add(candidate);
      if (!(await fs.pathExists(candidate))) continue;
      if (identityMatches(await this.inspector.readIdentity(candidate), record)) {
        return { path: candidate, tier: 'exact' };
      }
    }

    for (const candidate of index.get(basePackageName(record.name)) ?? []) {
      if (checked.has(candidate)) continue;
      if (identityMatches(await this.inspector.readIdentity(candidate), record)) {
        return { path: candidate, tier: 'fallback' };
      }
    }

    return null;
  }

  private async reconcileOne(
    record: PackageRecord,
    poolDir: string,
    workRoot: string,
    index: PoolIndex,
    repackAvailable: boolean
  ): Promise<ReconcileResult> {
    const existing = await this.findExisting(record, poolDir, index);
    if (existing) {
      return { status: 'present', record, path: existing.path, tier: existing.tier };
    }

    if (!repackAvailable) {
      return { status: 'skipped', record, reason: 'repack-unavailable', detail: 'dpkg-repack not installed' };
    }

    logger.info(`리팩: ${record.name} (${record.version}/${record.architecture})`);
    const itemDir = await fs.promises.mkdtemp(path.join(workRoot, `${basePackageName(record.name)}-`));

    try {
      const outcome = await this.repacker.repack(record, itemDir);
      if (!outcome.ok) {
        logger.warn(`건너뜀: ${record.name} (리팩 불가/가상 패키지?)`, { detail: outcome.detail });
        return { status: 'skipped', record, reason: 'repack-failed', detail: outcome.detail };
      }

      if (outcome.files.length === 0) {
        return { status: 'skipped', record, reason: 'no-archive-produced', detail: 'repack produced no .deb' };
      }
      const produced = await this.pickProduced(record, outcome.files);
      if (!produced) {
        return {
          status: 'skipped',
          record,
          reason: 'no-archive-produced',
          detail: `repack output does not match ${record.name} ${record.version} ${record.architecture}`,
        };
      }

      const filename = path.basename(produced);
      const dest = path.join(poolDir, filename);
      const moved = await moveNoClobber(produced, dest);
      if (moved === 'written') {
        return { status: 'repacked', record, path: dest };
      }

      // 같은 이름이 이미 있음. 덮어쓰지 않고 그 파일이 레코드를 뒷받침하는지만 확인
      if (identityMatches(await this.inspector.readIdentity(dest), record)) {
        const tier: MatchTier = canonicalDebFilenames(record).includes(filename) ? 'exact' : 'fallback';
        return { status: 'present', record, path: dest, tier };
      }
      logger.warn(`건너뜀: ${record.name} (풀의 ${filename}이 다른 내용)`, { dest });
      return {
        status: 'skipped',
        record,
        reason: 'pool-name-conflict',
        detail: `${filename} already in pool with different metadata`,
      };
    } finally {
      await fs.remove(itemDir);
    }
  }

  /**
   * 리팩 결과 중 레코드와 식별 정보가 일치하는 파일 선택
   */
  private async pickProduced(record: PackageRecord, files: string[]): Promise<string | null> {
    for (const file of files) {
      if (identityMatches(await this.inspector.readIdentity(file), record)) {
        return file;
      }
    }
    return null;
  }
}

/** 패키지 자체가 아니라 실행 중 오류로 건너뛴 사유 */
const FAILURE_REASONS: ReadonlySet<SkipReason> = new Set<SkipReason>(['worker-error', 'pool-name-conflict']);

export function summarize(results: ReconcileResult[]): ReconciliationSummary {
  return {
    results,
    present: results.filter((r) => r.status === 'present').length,
    repacked: results.filter((r) => r.status === 'repacked').length,
    skipped: results.filter((r) => r.status === 'skipped').length,
    failed: results.filter((r) => r.status === 'skipped' && FAILURE_REASONS.has(r.reason)).length,
  };
}
