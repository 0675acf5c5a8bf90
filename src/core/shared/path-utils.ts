/**
 * 경로 처리 유틸리티
 */

import * as path from 'path';

/**
 * 경로를 Unix 스타일(슬래시)로 변환
 * 인벤토리 CSV와 소스 설정에 기록되는 경로는 항상 forward slash
 */
export function toUnixPath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * baseDir 기준 상대 경로 (forward slash 사용)
 */
export function getRelativePath(fullPath: string, baseDir: string): string {
  return toUnixPath(path.relative(baseDir, fullPath));
}

/**
 * 상대 경로의 디렉토리 깊이 ('' 또는 '.' → 0)
 */
export function pathDepth(relativePath: string): number {
  if (relativePath === '' || relativePath === '.') return 0;
  return toUnixPath(relativePath).split('/').filter(Boolean).length;
}

/**
 * child가 parent와 같거나 그 하위 경로인지 확인
 */
export function isSameOrInside(child: string, parent: string): boolean {
  const relative = path.relative(path.resolve(parent), path.resolve(child));
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

/**
 * 격리 디렉토리 등에 쓰는 UTC 타임스탬프 (20240101T000000Z)
 */
export function utcStamp(date: Date = new Date()): string {
  return date.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}Z$/, 'Z');
}
