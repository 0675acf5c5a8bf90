/**
 * 최신 업데이트를 설치 없이 APT 캐시로 내려받기 (선택 단계)
 */

import { runChecked, type CommandRunner } from '../shared/command-runner';
import logger from '../../utils/logger';

const NONINTERACTIVE = { DEBIAN_FRONTEND: 'noninteractive' };

export async function fetchUpdates(runner: CommandRunner): Promise<void> {
  logger.info('인덱스 갱신 및 업데이트 다운로드 (설치 안 함)');
  await runChecked(runner, 'apt-get', ['update'], { env: NONINTERACTIVE }, 'UPDATE_FETCH_FAILED');
  await runChecked(
    runner,
    'apt-get',
    ['-y', '--download-only', 'dist-upgrade'],
    { env: NONINTERACTIVE },
    'UPDATE_FETCH_FAILED'
  );
}
