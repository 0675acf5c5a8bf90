/**
 * 소스 격리 및 전환 상태 머신
 *
 *   ACTIVE → QUARANTINED → SWITCHED → VERIFIED
 *      \__________\_____________\______→ FAILED
 *
 * 기존 소스 설정 파일은 타임스탬프 격리 디렉토리로 이동(복사/삭제 아님)되며, 이것이 유일한 복구 경로다.
 * 자동 롤백은 없다. 복구는 운영자가 격리 디렉토리에서 직접 한다.
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import type { SourceEntry, SourceSet, SwitchState, SwitchTransition } from '../../types';
import { DebsnapError, errorMessage } from '../errors';
import { runChecked, type CommandRunner } from '../shared/command-runner';
import { utcStamp } from '../shared/path-utils';
import { entryReferences, formatSourceLine, readSourceSet } from './sources';
import logger from '../../utils/logger';

export interface SourceSwitchOptions {
  /** APT 설정 루트 (/etc/apt) */
  aptDir: string;
  /** APT 인덱스 목록 디렉토리 (/var/lib/apt/lists) */
  listsDir: string;
  /** 스테이징된 로컬 저장소 */
  stagingDir: string;
  trusted: boolean;
  /** 격리 디렉토리 이름에 쓰는 타임스탬프 */
  stamp?: string;
  onOutput?: (chunk: string) => void;
}

export interface QuarantineResult {
  quarantineDir: string;
  moved: string[];
  /** 이동하지 못한 파일 (가드에서 다시 걸러진다) */
  failed: { file: string; error: string }[];
}

const ALLOWED: Record<SwitchState, SwitchState[]> = {
  ACTIVE: ['QUARANTINED', 'FAILED'],
  QUARANTINED: ['SWITCHED', 'FAILED'],
  SWITCHED: ['VERIFIED', 'FAILED'],
  VERIFIED: [],
  FAILED: [],
};

const NONINTERACTIVE = { DEBIAN_FRONTEND: 'noninteractive' };

export class SourceSwitch {
  private state: SwitchState = 'ACTIVE';
  private guardPassed = false;
  private quarantineDir: string | null = null;
  readonly history: SwitchTransition[] = [];

  constructor(
    private readonly runner: CommandRunner,
    private readonly options: SourceSwitchOptions
  ) {}

  getState(): SwitchState {
    return this.state;
  }

  getQuarantineDir(): string | null {
    return this.quarantineDir;
  }

  get sourcesListPath(): string {
    return path.join(this.options.aptDir, 'sources.list');
  }

  get sourcesListDir(): string {
    return path.join(this.options.aptDir, 'sources.list.d');
  }

  /**
   * ACTIVE → QUARANTINED
   * sources.list와 sources.list.d/* 를 격리 디렉토리로 이동한다.
   */
  async quarantine(): Promise<QuarantineResult> {
    this.expectState('ACTIVE', 'quarantine');

    const stamp = this.options.stamp ?? utcStamp();
    const quarantineDir = path.join(this.options.aptDir, `sources.backup.${stamp}`);
    const result: QuarantineResult = { quarantineDir, moved: [], failed: [] };

    try {
      await fs.ensureDir(this.options.aptDir);
      // 격리 디렉토리는 한 번만 쓴다. 이미 있으면 실패
      await fs.promises.mkdir(quarantineDir);
    } catch (error) {
      return this.fail(
        new DebsnapError('QUARANTINE_FAILED', `격리 디렉토리를 만들 수 없습니다: ${errorMessage(error)}`, {
          context: { quarantineDir },
        })
      );
    }
    this.quarantineDir = quarantineDir;

    const targets: { file: string; name: string }[] = [];
    if (await fs.pathExists(this.sourcesListPath)) {
      targets.push({ file: this.sourcesListPath, name: 'sources.list' });
    }
    if (await fs.pathExists(this.sourcesListDir)) {
      for (const name of (await fs.readdir(this.sourcesListDir)).sort()) {
        targets.push({
          file: path.join(this.sourcesListDir, name),
          name: name === 'sources.list' ? `sources.list.d__${name}` : name,
        });
      }
    }

    for (const target of targets) {
      try {
        await fs.move(target.file, path.join(quarantineDir, target.name), { overwrite: false });
        result.moved.push(target.file);
      } catch (error) {
        logger.warn('소스 파일 격리 실패', { file: target.file, error: errorMessage(error) });
        result.failed.push({ file: target.file, error: errorMessage(error) });
      }
    }

    this.transition('QUARANTINED', `${result.moved.length}개 파일 격리`);
    logger.info('기존 APT 소스 격리 완료', { quarantineDir, moved: result.moved.length, failed: result.failed.length });
    return result;
  }

  /**
   * QUARANTINED → SWITCHED
   * 스테이징된 저장소를 가리키는 소스 한 줄만 기록한다.
   */
  async switchToLocal(): Promise<string> {
    this.expectState('QUARANTINED', 'switch');

    const line = formatSourceLine(this.options.stagingDir, this.options.trusted);
    try {
      await fs.ensureDir(this.sourcesListDir);
      await fs.writeFile(this.sourcesListPath, line + '\n', { encoding: 'utf-8', flag: 'wx' });
    } catch (error) {
      return this.fail(
        new DebsnapError('STRAY_SOURCE', `로컬 소스를 기록할 수 없습니다: ${errorMessage(error)}`, {
          remediation: this.quarantineDir ?? undefined,
        })
      );
    }

    this.transition('SWITCHED', line);
    return line;
  }

  /**
   * SWITCHED 상태를 벗어나기 전 안전 검사
   * 활성 소스가 정확히 하나이고 스테이징 경로를 가리켜야 한다.
   */
  async guard(): Promise<SourceEntry[]> {
    this.expectState('SWITCHED', 'guard');

    const where = this.quarantineDir ?? this.options.aptDir;
    let set: SourceSet;
    try {
      set = await readSourceSet(this.options.aptDir);
    } catch (error) {
      return this.fail(
        new DebsnapError('STRAY_SOURCE', `APT 소스 설정을 읽을 수 없습니다: ${errorMessage(error)}`, {
          remediation: where,
          cause: error,
        })
      );
    }

    const { entries, unreadable } = set;
    const stray = entries.filter((entry) => !entryReferences(entry, this.options.stagingDir));

    // 읽지 못한 파일은 내용을 확인할 수 없으므로 남은 소스로 본다
    if (stray.length > 0 || unreadable.length > 0 || entries.length !== 1) {
      const detail =
        stray.length > 0 || unreadable.length > 0
          ? [
              ...stray.map((entry) => `${entry.file}:${entry.line}: ${entry.raw}`),
              ...unreadable.map((item) => `${item.file}: 읽을 수 없음 (${item.error})`),
            ].join('\n')
          : `활성 소스 ${entries.length}개`;
      return this.fail(
        new DebsnapError(
          'STRAY_SOURCE',
          `격리 후에도 다른 APT 소스가 남아 있습니다. ${where} 와 ${this.options.aptDir} 를 확인하세요. 중단합니다.\n${detail}`,
          {
            remediation: where,
            context: { stray: stray.length, unreadable: unreadable.length, entries: entries.length },
          }
        )
      );
    }

    this.guardPassed = true;
    return entries;
  }

  /**
   * SWITCHED → VERIFIED
   * 새 소스 하나만으로 인덱스 갱신이 성공해야 한다.
   */
  async verify(): Promise<void> {
    this.expectState('SWITCHED', 'verify');
    if (!this.guardPassed) {
      throw new DebsnapError('INVALID_TRANSITION', '가드 검사 전에는 검증할 수 없습니다');
    }

    try {
      await this.refreshIndex();
    } catch (error) {
      return this.fail(
        new DebsnapError(
          'VERIFICATION_FAILED',
          `로컬 저장소만으로 apt-get update에 실패했습니다: ${errorMessage(error)}`,
          { remediation: this.quarantineDir ?? undefined, cause: error }
        )
      );
    }

    this.transition('VERIFIED', 'apt-get update 성공');
  }

  /**
   * 목록/캐시를 비우고 활성 소스로 인덱스 갱신
   * 갱신 후 Packages 인덱스가 하나도 없으면 실패로 본다.
   */
  async refreshIndex(): Promise<void> {
    if (await fs.pathExists(this.options.listsDir)) {
      for (const name of await fs.readdir(this.options.listsDir)) {
        await fs.remove(path.join(this.options.listsDir, name));
      }
    }
    await runChecked(this.runner, 'apt-get', ['clean'], { env: NONINTERACTIVE, onOutput: this.options.onOutput });
    await runChecked(this.runner, 'apt-get', ['update'], { env: NONINTERACTIVE, onOutput: this.options.onOutput });

    const lists = (await fs.pathExists(this.options.listsDir)) ? await fs.readdir(this.options.listsDir) : [];
    if (!lists.some((name) => name.endsWith('Packages') || name.includes('_Packages'))) {
      throw new Error(`${this.options.listsDir} 에 가져온 Packages 인덱스가 없습니다`);
    }
  }

  /**
   * 격리 → 전환 → 가드 → 검증 전체 실행. 실패 시 즉시 중단 (fail-closed)
   */
  async run(): Promise<QuarantineResult> {
    const quarantined = await this.quarantine();
    await this.switchToLocal();
    await this.guard();
    await this.verify();
    return quarantined;
  }

  private expectState(expected: SwitchState, action: string): void {
    if (this.state !== expected) {
      throw new DebsnapError('INVALID_TRANSITION', `${this.state} 상태에서는 ${action}을(를) 할 수 없습니다`, {
        context: { state: this.state, expected },
      });
    }
  }

  private transition(to: SwitchState, note?: string): void {
    if (!ALLOWED[this.state].includes(to)) {
      throw new DebsnapError('INVALID_TRANSITION', `허용되지 않은 상태 전이: ${this.state} → ${to}`);
    }
    this.history.push({ from: this.state, to, at: new Date().toISOString(), note });
    logger.info(`소스 전환 상태: ${this.state} → ${to}`, note ? { note } : undefined);
    this.state = to;
  }

  /**
   * FAILED로 전이하고 에러를 던진다
   */
  private fail(error: DebsnapError): never {
    if (this.state !== 'FAILED') {
      this.transition('FAILED', error.message);
    }
    logger.error(error.message, { code: error.code, remediation: error.remediation });
    throw error;
  }
}
