/**
 * Debian 컨트롤 필드 / .deb 파일명 유틸리티
 */

import type { ArchiveIdentity, PackageRecord } from '../../types';
import type { CommandRunner } from './command-runner';

/**
 * Debian 컨트롤 필드 파싱 (멀티라인 지원)
 * 빈 줄로 구분된 첫 번째 스탠자만 읽는다.
 */
export function parseDebControlFields(text: string): Map<string, string> {
  const fields = new Map<string, string>();
  const lines = text.replace(/\r\n/g, '\n').split('\n');

  let currentKey = '';
  let currentValue = '';

  for (const line of lines) {
    if (line.trim() === '') {
      if (currentKey) break;
      continue;
    }
    if (line.startsWith(' ') || line.startsWith('\t')) {
      // 멀티라인 필드 (공백/탭으로 시작)
      if (currentKey) {
        currentValue += '\n' + line.substring(1);
      }
    } else if (line.includes(':')) {
      if (currentKey) {
        fields.set(currentKey, currentValue);
      }
      const colonIndex = line.indexOf(':');
      currentKey = line.substring(0, colonIndex).trim();
      currentValue = line.substring(colonIndex + 1).trim();
    }
  }

  if (currentKey) {
    fields.set(currentKey, currentValue);
  }

  return fields;
}

/**
 * `${binary:Package}`의 멀티아키 한정자 제거 (libc6:amd64 → libc6)
 */
export function basePackageName(name: string): string {
  const colon = name.indexOf(':');
  return colon === -1 ? name : name.substring(0, colon);
}

/**
 * 버전에서 epoch 제거 (1:2.0-1 → 2.0-1)
 */
export function stripEpoch(version: string): string {
  return version.replace(/^\d+:/, '');
}

/**
 * 레코드에 대응하는 정규 파일명 후보들
 * - dpkg-repack: epoch 제거
 * - APT 캐시: epoch 콜론을 %3a로 인코딩
 * - 콜론 그대로 사용하는 경우
 */
export function canonicalDebFilenames(record: PackageRecord): string[] {
  const name = basePackageName(record.name);
  const variants = [
    stripEpoch(record.version),
    record.version.replace(/:/g, '%3a'),
    record.version,
  ];
  return [...new Set(variants)].map((v) => `${name}_${v}_${record.architecture}.deb`);
}

/**
 * .deb 파일명에서 패키지명 부분 추출 (첫 번째 `_` 앞)
 * Debian 패키지명에는 `_`가 올 수 없으므로 접두사 비교에 사용 가능
 */
export function debFilenamePackage(filename: string): string | null {
  if (!filename.endsWith('.deb')) return null;
  const underscore = filename.indexOf('_');
  return underscore > 0 ? filename.substring(0, underscore) : null;
}

/**
 * 아카이브 식별 정보가 레코드와 일치하는지 확인
 */
export function identityMatches(identity: ArchiveIdentity, record: PackageRecord): boolean {
  return (
    identity.name === basePackageName(record.name) &&
    identity.version === record.version &&
    identity.architecture === record.architecture
  );
}

/**
 * .deb 아카이브의 내장 메타데이터 읽기
 */
export interface DebInspector {
  /** 필드를 읽지 못하면 해당 필드는 빈 문자열 */
  readIdentity(debPath: string): Promise<ArchiveIdentity>;
}

/**
 * dpkg-deb -f 기반 검사기
 */
export class DpkgDebInspector implements DebInspector {
  constructor(private readonly runner: CommandRunner) {}

  async readIdentity(debPath: string): Promise<ArchiveIdentity> {
    const result = await this.runner.run('dpkg-deb', ['-f', debPath, 'Package', 'Version', 'Architecture']);
    const fields = result.exitCode === 0 ? parseDebControlFields(result.stdout) : new Map<string, string>();
    return {
      name: fields.get('Package') ?? '',
      version: fields.get('Version') ?? '',
      architecture: fields.get('Architecture') ?? '',
    };
  }
}
