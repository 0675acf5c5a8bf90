import chalk from 'chalk';
import Table from 'cli-table3';
import * as path from 'path';
import { getConfigManager } from '../../core/config';
import { InstallerPipeline, type InstallStage } from '../../core/installer/installer-pipeline';
import { SpawnCommandRunner } from '../../core/shared/command-runner';
import { exitWithError, parseYesNo } from '../output';

// install 옵션
export interface InstallCommandOptions {
  searchRoot?: string;
  stagingDir?: string;
  aptDir?: string;
  desktopMeta?: string;
  /** --no-desktop 이면 false */
  desktop: boolean;
  trusted?: string;
  quiet?: boolean;
}

const STAGE_LABELS: Record<InstallStage, string> = {
  discover: '오프라인 저장소 탐색',
  stage: '저장소 스테이징',
  switch: 'APT 소스 격리 및 전환',
  upgrade: '오프라인 업그레이드',
  report: '결과 확인',
};

/**
 * install 명령어 핸들러
 */
export async function installCommand(options: InstallCommandOptions): Promise<void> {
  const config = getConfigManager().getConfig();

  try {
    const pipeline = new InstallerPipeline({ runner: new SpawnCommandRunner() });

    pipeline.on('stage', (stage) => {
      console.log(chalk.cyan(`\n==> ${STAGE_LABELS[stage]}`));
    });
    pipeline.on('output', (chunk) => {
      if (!options.quiet) process.stdout.write(chalk.gray(chunk));
    });
    pipeline.on('step', (step) => {
      const mark = step.ok ? chalk.green('✓') : chalk.yellow('!');
      console.log(`${mark} ${step.name}${step.detail ? chalk.gray(` (${step.detail})`) : ''}`);
    });

    const result = await pipeline.run({
      searchRoot: path.resolve(options.searchRoot ?? process.cwd()),
      stagingDir: options.stagingDir ? path.resolve(options.stagingDir) : config.stagingDir,
      aptDir: options.aptDir ? path.resolve(options.aptDir) : config.aptDir,
      listsDir: config.aptListsDir,
      logDir: config.upgradeLogDir,
      trusted: options.trusted === undefined ? config.trusted : parseYesNo(options.trusted),
      desktopMeta: options.desktop ? (options.desktopMeta ?? config.desktopMeta) : null,
    });

    console.log(chalk.green('\n✓ 오프라인 업그레이드 완료'));
    console.log(chalk.gray(`  저장소: ${result.repoDir} → ${result.staging.stagingDir}`));
    console.log(chalk.gray(`  격리 디렉토리: ${result.quarantine.quarantineDir}`));

    const table = new Table({
      head: [chalk.cyan('커널 이미지'), chalk.cyan('버전')],
    });
    for (const kernel of result.report.kernels) {
      table.push([kernel.name, kernel.version]);
    }
    console.log(table.toString());

    console.log(chalk.cyan('\n활성 APT 소스:'));
    for (const line of result.report.activeSources) {
      console.log(`  ${line}`);
    }
    if (result.report.logFile) {
      console.log(chalk.gray(`\n  로그: ${result.report.logFile}`));
    }
    console.log(chalk.yellow('\n재부팅을 권장합니다: sudo reboot'));
  } catch (error) {
    exitWithError(error);
  }
}
