import { Presets, SingleBar } from 'cli-progress';
import chalk from 'chalk';
import Table from 'cli-table3';
import * as path from 'path';
import { getConfigManager } from '../../core/config';
import { BuilderPipeline, type BuildStage } from '../../core/builder/builder-pipeline';
import { DpkgRepacker } from '../../core/builder/repacker';
import { SpawnCommandRunner } from '../../core/shared/command-runner';
import { DpkgDebInspector } from '../../core/shared/deb-control';
import { formatBytes } from '../../core/shared/file-utils';
import { exitWithError, parseJobsOption, parseYesNo } from '../output';

// build 옵션
export interface BuildCommandOptions {
  repoDir?: string;
  cacheDir?: string;
  includeUpdates?: boolean;
  register?: boolean;
  trusted?: string;
  jobs?: string;
}

const STAGE_LABELS: Record<BuildStage, string> = {
  fetch: '업데이트 다운로드 (설치 안 함)',
  harvest: 'APT 캐시 수집',
  query: '설치 패키지 조회',
  reconcile: '누락 패키지 리팩',
  index: 'Packages / Release 생성',
  audit: '인벤토리 작성 (SHA-256)',
  register: '로컬 저장소 등록',
};

/**
 * build 명령어 핸들러
 */
export async function buildCommand(options: BuildCommandOptions): Promise<void> {
  const config = getConfigManager().getConfig();

  try {
    const repoDir = path.resolve(options.repoDir ?? config.repoDir);
    const trusted = options.trusted === undefined ? config.trusted : parseYesNo(options.trusted);
    const jobs = parseJobsOption(options.jobs) ?? config.jobs ?? undefined;

    const runner = new SpawnCommandRunner();
    const pipeline = new BuilderPipeline({
      runner,
      inspector: new DpkgDebInspector(runner),
      repacker: new DpkgRepacker(runner),
    });

    console.log(chalk.cyan(`저장소: ${repoDir}\n`));

    let bar: SingleBar | null = null;
    const stopBar = (): void => {
      bar?.stop();
      bar = null;
    };
    const startBar = (label: string, total: number): SingleBar => {
      const next = new SingleBar(
        { format: ` {bar} | ${label} | {value}/{total}`, hideCursor: true },
        Presets.shades_classic
      );
      next.start(total, 0);
      return next;
    };

    pipeline.on('stage', (stage) => {
      stopBar();
      console.log(chalk.cyan(`==> ${STAGE_LABELS[stage]}`));
    });

    pipeline.on('itemComplete', (result, completed, total) => {
      bar = bar ?? startBar('재조정', total);
      bar.update(completed);
      if (result.status === 'skipped') {
        bar.stop();
        console.log(chalk.yellow(`  건너뜀: ${result.record.name} (${result.reason}) ${result.detail}`));
        bar.start(total, completed);
      }
      if (completed === total) stopBar();
    });

    pipeline.on('auditProgress', (completed, total) => {
      bar = bar ?? startBar('감사', total);
      bar.update(completed);
      if (completed === total) stopBar();
    });

    const report = await pipeline.run({
      repoDir,
      cacheDir: options.cacheDir ? path.resolve(options.cacheDir) : config.aptCacheDir,
      includeUpdates: options.includeUpdates ?? false,
      register: options.register ?? false,
      trusted,
      aptDir: config.aptDir,
      jobs,
    });
    stopBar();

    const table = new Table({
      head: [chalk.cyan('항목'), chalk.cyan('값')],
    });
    table.push(
      ['설치 패키지', String(report.installedCount)],
      ['캐시에서 복사', `${report.harvest.copied} (기존 ${report.harvest.existing})`],
      ['이미 있음', String(report.reconciliation.present)],
      ['리팩', String(report.reconciliation.repacked)],
      ['건너뜀', `${report.reconciliation.skipped} (오류 ${report.reconciliation.failed})`],
      ['인덱스 항목', String(report.index.entryCount)],
      ['인벤토리 행', String(report.inventory.rows.length)],
      ['풀 크기', formatBytes(report.inventory.rows.reduce((sum, row) => sum + row.sizeBytes, 0))]
    );

    console.log(chalk.green('\n✓ 오프라인 저장소 생성 완료'));
    console.log(table.toString());
    console.log(chalk.gray(`  Packages: ${report.index.packagesPath}`));
    console.log(chalk.gray(`  인벤토리: ${report.inventory.csvPath}`));
    if (report.registeredList) {
      console.log(chalk.gray(`  등록: ${report.registeredList}`));
    }
  } catch (error) {
    exitWithError(error);
  }
}
