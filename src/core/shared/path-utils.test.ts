/**
 * 경로 처리 유틸리티 테스트
 */

import { describe, it, expect } from 'vitest';
import { toUnixPath, getRelativePath, pathDepth, isSameOrInside, utcStamp } from './path-utils';

describe('path-utils', () => {
  describe('toUnixPath', () => {
    it('백슬래시를 슬래시로 변환', () => {
      expect(toUnixPath('a\\b\\c.deb')).toBe('a/b/c.deb');
    });

    it('이미 Unix 경로면 그대로 유지', () => {
      expect(toUnixPath('/home/user/file.txt')).toBe('/home/user/file.txt');
    });
  });

  describe('getRelativePath', () => {
    it('기준 디렉토리 상대 경로', () => {
      expect(getRelativePath('/repo/pool/a.deb', '/repo')).toBe('pool/a.deb');
    });

    it('같은 경로는 빈 문자열', () => {
      expect(getRelativePath('/repo', '/repo')).toBe('');
    });
  });

  describe('pathDepth', () => {
    it('루트 자신은 깊이 0', () => {
      expect(pathDepth('')).toBe(0);
      expect(pathDepth('.')).toBe(0);
    });

    it('세그먼트 수', () => {
      expect(pathDepth('a')).toBe(1);
      expect(pathDepth('a/b/c')).toBe(3);
    });
  });

  describe('isSameOrInside', () => {
    it('같은 경로', () => {
      expect(isSameOrInside('/opt/repo', '/opt/repo')).toBe(true);
    });

    it('하위 경로', () => {
      expect(isSameOrInside('/opt/repo/pool', '/opt/repo')).toBe(true);
    });

    it('이름 접두사만 같은 형제 경로는 하위가 아님', () => {
      expect(isSameOrInside('/opt/repo2', '/opt/repo')).toBe(false);
    });

    it('상위 경로는 하위가 아님', () => {
      expect(isSameOrInside('/opt', '/opt/repo')).toBe(false);
    });
  });

  describe('utcStamp', () => {
    it('UTC 기본 형식', () => {
      expect(utcStamp(new Date('2024-03-05T07:08:09.123Z'))).toBe('20240305T070809Z');
    });
  });
});
