import chalk from 'chalk';
import Table from 'cli-table3';
import { getConfigManager, isConfigKey, type ConfigKey } from '../../core/config';
import { errorMessage } from '../../core/errors';

const DESCRIPTIONS: Record<ConfigKey, string> = {
  repoDir: '빌드 저장소 경로',
  aptCacheDir: 'APT 캐시 경로',
  jobs: '워커 수 (null = CPU 수)',
  trusted: '[trusted=yes] 사용',
  stagingDir: '설치 스테이징 경로',
  aptDir: 'APT 설정 경로',
  aptListsDir: 'APT 인덱스 목록 경로',
  upgradeLogDir: '업그레이드 로그 경로',
  desktopMeta: '데스크톱 메타 패키지',
  logLevel: '로그 레벨',
};

/**
 * 설정값 조회
 */
export async function configGet(key?: string): Promise<void> {
  const config = getConfigManager().getConfig();

  if (key) {
    if (isConfigKey(key)) {
      console.log(chalk.cyan(`${key}: `) + chalk.white(JSON.stringify(config[key])));
    } else {
      console.log(chalk.yellow(`설정 '${key}'를 찾을 수 없습니다`));
      process.exit(1);
    }
  } else {
    console.log(chalk.cyan('\n현재 설정:'));
    console.log(JSON.stringify(config, null, 2));
  }
}

/**
 * 설정값 변경
 */
export async function configSet(key: string, value: string): Promise<void> {
  try {
    const config = getConfigManager().set(key, value);
    const saved = isConfigKey(key) ? config[key] : value;
    console.log(chalk.green(`✓ 설정이 저장되었습니다: ${key} = ${JSON.stringify(saved)}`));
  } catch (error) {
    console.error(chalk.red(`설정 저장 실패: ${errorMessage(error)}`));
    process.exit(1);
  }
}

/**
 * 모든 설정 표시
 */
export async function configList(): Promise<void> {
  const config = getConfigManager().getConfig();

  const table = new Table({
    head: [chalk.cyan('설정'), chalk.cyan('값'), chalk.cyan('설명')],
    colWidths: [18, 36, 28],
  });

  for (const [key, value] of Object.entries(config)) {
    table.push([key, String(value), isConfigKey(key) ? DESCRIPTIONS[key] : '-']);
  }

  console.log(chalk.cyan('\n설정 목록:\n'));
  console.log(table.toString());
}

/**
 * 설정 초기화
 */
export async function configReset(): Promise<void> {
  try {
    getConfigManager().reset();
    console.log(chalk.green('✓ 설정이 초기화되었습니다'));
  } catch (error) {
    console.error(chalk.red(`설정 초기화 실패: ${errorMessage(error)}`));
    process.exit(1);
  }
}
