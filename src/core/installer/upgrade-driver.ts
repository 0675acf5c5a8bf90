/**
 * 오프라인 업그레이드 실행
 * VERIFIED 상태의 소스 전환 이후에만 실행된다. 필수 단계 외에는 실패해도 계속 진행한다.
 */

import type { CommandRunner, RunOptions } from '../shared/command-runner';
import { DebsnapError, errorMessage } from '../errors';
import type { SourceSwitch } from './source-switch';
import logger from '../../utils/logger';

export interface UpgradeStep {
  name: string;
  command: string;
  ok: boolean;
  /** 필수 단계는 실패 시 파이프라인을 중단시킨다 */
  required: boolean;
  detail?: string;
}

export interface UpgradeOptions {
  /** 업그레이드 후 설치할 데스크톱 메타 패키지. null이면 건너뜀 */
  desktopMeta: string | null;
  /** 커널/식별 패키지 */
  basePackages?: string[];
  onOutput?: (chunk: string) => void;
  onStep?: (step: UpgradeStep) => void;
}

const DEFAULT_BASE_PACKAGES = ['linux-generic', 'base-files', 'lsb-release'];
const KEEP_CONFIG = ['-o', 'Dpkg::Options::=--force-confold', '-o', 'Dpkg::Options::=--force-confdef'];

export class UpgradeDriver {
  private readonly steps: UpgradeStep[] = [];

  constructor(
    private readonly runner: CommandRunner,
    private readonly sourceSwitch: SourceSwitch,
    private readonly options: UpgradeOptions
  ) {}

  /**
   * 전체 업그레이드 실행
   */
  async run(): Promise<UpgradeStep[]> {
    if (this.sourceSwitch.getState() !== 'VERIFIED') {
      throw new DebsnapError(
        'INVALID_TRANSITION',
        `소스 전환이 검증되지 않았습니다 (${this.sourceSwitch.getState()}). 업그레이드를 실행하지 않습니다.`
      );
    }

    await this.apt('full-upgrade 1차', ['-y', ...KEEP_CONFIG, 'full-upgrade']);
    await this.apt('full-upgrade 2차 (정리)', ['-y', ...KEEP_CONFIG, 'full-upgrade']);
    await this.apt('커널/식별 패키지 설치', ['-y', 'install', ...(this.options.basePackages ?? DEFAULT_BASE_PACKAGES)]);

    if (this.options.desktopMeta) {
      await this.apt(`${this.options.desktopMeta} 설치`, ['-y', 'install', this.options.desktopMeta]);
    }

    await this.bestEffort('initramfs 재생성', 'update-initramfs', ['-u', '-k', 'all']);
    await this.bestEffort('GRUB 갱신', 'update-grub', []);

    // 최종 로컬 전용 갱신. 인덱스를 다시 가져오지 못하면 중단
    try {
      await this.sourceSwitch.refreshIndex();
      this.record({ name: '최종 인덱스 갱신', command: 'apt-get update', ok: true, required: true });
    } catch (error) {
      this.record({
        name: '최종 인덱스 갱신',
        command: 'apt-get update',
        ok: false,
        required: true,
        detail: errorMessage(error),
      });
      throw new DebsnapError('VERIFICATION_FAILED', `최종 apt-get update 실패: ${errorMessage(error)}`, {
        remediation: this.sourceSwitch.getQuarantineDir() ?? undefined,
        cause: error,
      });
    }

    await this.apt('최종 full-upgrade', ['-y', ...KEEP_CONFIG, 'full-upgrade']);
    await this.apt('autoremove', ['-y', 'autoremove', '--purge']);

    return [...this.steps];
  }

  private apt(name: string, args: string[]): Promise<UpgradeStep> {
    return this.bestEffort(name, 'apt-get', args);
  }

  /**
   * 실패해도 계속 진행하는 단계
   */
  private async bestEffort(name: string, command: string, args: string[]): Promise<UpgradeStep> {
    const commandLine = [command, ...args].join(' ');

    if (command !== 'apt-get' && !(await this.runner.which(command))) {
      return this.record({ name, command: commandLine, ok: false, required: false, detail: `${command} 없음` });
    }

    const runOptions: RunOptions = {
      env: { DEBIAN_FRONTEND: 'noninteractive' },
      onOutput: this.options.onOutput,
    };
    const result = await this.runner.run(command, args, runOptions);
    const ok = result.exitCode === 0;
    if (!ok) {
      logger.warn(`${name} 실패 (계속 진행)`, { command: commandLine, exitCode: result.exitCode });
    }
    return this.record({
      name,
      command: commandLine,
      ok,
      required: false,
      detail: ok ? undefined : `exit ${result.exitCode}`,
    });
  }

  private record(step: UpgradeStep): UpgradeStep {
    this.steps.push(step);
    this.options.onStep?.(step);
    return step;
  }
}
