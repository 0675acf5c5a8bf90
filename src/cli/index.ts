#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import logger from '../utils/logger';

// 버전 정보
const VERSION = '1.0.0';

// 메인 프로그램
const program = new Command();

program
  .name('debsnap')
  .description(chalk.cyan('debsnap - 설치 상태 스냅샷 오프라인 APT 저장소 생성 및 오프라인 업그레이드'))
  .version(VERSION, '-v, --version', '버전 정보 표시')
  .helpOption('-h, --help', '도움말 표시');

// 명령 실행 전 파일 로거 초기화
program.hook('preAction', async () => {
  await logger.initialize();
});

// build 명령어
program
  .command('build')
  .description('이 호스트의 설치 패키지로 오프라인 저장소 생성')
  .option('-r, --repo-dir <path>', '저장소 경로')
  .option('--cache-dir <path>', 'APT 캐시 경로')
  .option('-u, --include-updates', '최신 업데이트를 먼저 다운로드 (설치 안 함)')
  .option('--register', '생성한 저장소를 이 호스트의 APT 소스로 등록')
  .option('--trusted <yes|no>', '소스 엔트리에 [trusted=yes] 사용')
  .option('-j, --jobs <num>', '워커 수 (기본: CPU 수)')
  .action(async (options) => {
    const { buildCommand } = await import('./commands/build');
    await buildCommand(options);
  });

// install 명령어
program
  .command('install')
  .description('오프라인 저장소로 APT 소스를 전환하고 업그레이드 (root 필요)')
  .option('-s, --search-root <path>', '저장소 탐색 시작 위치 (기본: 현재 디렉토리)')
  .option('--staging-dir <path>', '스테이징 경로')
  .option('--apt-dir <path>', 'APT 설정 경로')
  .option('--desktop-meta <name>', '업그레이드 후 설치할 데스크톱 메타 패키지')
  .option('--no-desktop', '데스크톱 메타 패키지 설치 안 함')
  .option('--trusted <yes|no>', '소스 엔트리에 [trusted=yes] 사용')
  .option('-q, --quiet', 'apt 출력 숨김')
  .action(async (options) => {
    const { installCommand } = await import('./commands/install');
    await installCommand(options);
  });

// verify 명령어
program
  .command('verify')
  .description('인벤토리 CSV의 SHA-256을 다시 계산해 비교')
  .option('-r, --repo-dir <path>', '저장소 경로')
  .option('-j, --jobs <num>', '워커 수 (기본: CPU 수)')
  .action(async (options) => {
    const { verifyCommand } = await import('./commands/verify');
    await verifyCommand(options);
  });

// config 명령어
program
  .command('config')
  .description('설정 관리')
  .addCommand(
    new Command('get')
      .description('설정값 조회')
      .argument('[key]', '설정 키')
      .action(async (key) => {
        const { configGet } = await import('./commands/config');
        await configGet(key);
      })
  )
  .addCommand(
    new Command('set')
      .description('설정값 변경')
      .argument('<key>', '설정 키')
      .argument('<value>', '설정값')
      .action(async (key, value) => {
        const { configSet } = await import('./commands/config');
        await configSet(key, value);
      })
  )
  .addCommand(
    new Command('list')
      .description('모든 설정 표시')
      .action(async () => {
        const { configList } = await import('./commands/config');
        await configList();
      })
  )
  .addCommand(
    new Command('reset')
      .description('설정 초기화')
      .action(async () => {
        const { configReset } = await import('./commands/config');
        await configReset();
      })
  );

// 에러 핸들링
program.exitOverride((err) => {
  if (err.code === 'commander.help' || err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  console.error(chalk.red(`오류: ${err.message}`));
  process.exit(1);
});

// 명령어가 없으면 도움말 표시
if (process.argv.length <= 2) {
  console.log(chalk.cyan('\n  debsnap - 오프라인 APT 저장소 생성 및 오프라인 업그레이드\n'));
  console.log('  사용법: debsnap <명령어> [옵션]\n');
  console.log('  명령어:');
  console.log('    build       오프라인 저장소 생성');
  console.log('    install     오프라인 저장소로 업그레이드');
  console.log('    verify      인벤토리 해시 검증');
  console.log('    config      설정 관리');
  console.log('\n  예시:');
  console.log(chalk.gray('    debsnap build -r ~/offline-repo --include-updates'));
  console.log(chalk.gray('    sudo debsnap install -s /media/usb'));
  console.log(chalk.gray('    debsnap verify -r ~/offline-repo'));
  console.log('\n  자세한 내용: debsnap --help\n');
} else {
  // 파싱 및 실행
  program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(chalk.red(`오류: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  });
}
