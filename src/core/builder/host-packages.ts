/**
 * 호스트 설치 패키지 조회
 * dpkg 데이터베이스에서 (이름, 버전, 아키텍처) 스냅샷을 한 번 만든다.
 */

import type { PackageRecord } from '../../types';
import { runChecked, type CommandRunner } from '../shared/command-runner';

const QUERY_FORMAT = '${binary:Package} ${Version} ${Architecture}\\n';

/**
 * 레코드 고유 키
 */
export function recordKey(record: PackageRecord): string {
  return `${record.name} ${record.version} ${record.architecture}`;
}

/**
 * 중복 제거 후 정렬 (`sort -u` 대응)
 * 재실행 시 같은 순서로 처리되도록 코드 포인트 순으로 비교
 */
export function sortRecords(records: PackageRecord[]): PackageRecord[] {
  const unique = new Map<string, PackageRecord>();
  for (const record of records) {
    unique.set(recordKey(record), record);
  }
  return [...unique.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([, record]) => record);
}

/**
 * dpkg-query 출력 파싱. 필드가 3개가 아닌 줄은 무시
 */
export function parseInstalledList(output: string): PackageRecord[] {
  const records: PackageRecord[] = [];
  for (const line of output.split('\n')) {
    const parts = line.trim().split(/\s+/);
    if (parts.length !== 3 || !parts[0]) continue;
    const [name, version, architecture] = parts;
    records.push({ name, version, architecture });
  }
  return sortRecords(records);
}

/**
 * 호스트에 설치된 패키지 목록 조회
 */
export async function queryInstalledPackages(runner: CommandRunner): Promise<PackageRecord[]> {
  const result = await runChecked(runner, 'dpkg-query', ['-W', `-f=${QUERY_FORMAT}`]);
  return parseInstalledList(result.stdout);
}
