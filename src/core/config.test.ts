import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as path from 'path';
import { ConfigManager, DEFAULT_CONFIG, parseConfigValue, isConfigKey } from './config';
import { makeTempDir } from '../test-utils/tmp';

describe('config', () => {
  describe('parseConfigValue', () => {
    it('jobs', () => {
      expect(parseConfigValue('jobs', '4')).toBe(4);
      expect(parseConfigValue('jobs', 'auto')).toBeNull();
      expect(() => parseConfigValue('jobs', '0')).toThrow('jobs는 1 이상의 정수 또는 auto여야 합니다: 0');
      expect(() => parseConfigValue('jobs', '1.5')).toThrow();
    });

    it('trusted', () => {
      expect(parseConfigValue('trusted', 'yes')).toBe(true);
      expect(parseConfigValue('trusted', 'no')).toBe(false);
      expect(() => parseConfigValue('trusted', 'maybe')).toThrow();
    });

    it('desktopMeta는 none이면 null', () => {
      expect(parseConfigValue('desktopMeta', 'none')).toBeNull();
      expect(parseConfigValue('desktopMeta', 'kubuntu-desktop')).toBe('kubuntu-desktop');
    });

    it('경로는 절대 경로로', () => {
      expect(parseConfigValue('repoDir', '/srv/../srv/repo')).toBe('/srv/repo');
      expect(() => parseConfigValue('repoDir', '')).toThrow('repoDir 값이 비어 있습니다');
    });

    it('logLevel', () => {
      expect(parseConfigValue('logLevel', 'debug')).toBe('debug');
      expect(() => parseConfigValue('logLevel', 'verbose')).toThrow();
    });

    it('설정 키 확인', () => {
      expect(isConfigKey('stagingDir')).toBe(true);
      expect(isConfigKey('cachePath')).toBe(false);
    });
  });

  describe('ConfigManager', () => {
    let dir: string;
    let manager: ConfigManager;

    beforeEach(async () => {
      dir = await makeTempDir();
      manager = new ConfigManager(dir);
    });

    afterEach(async () => {
      await fs.remove(dir);
    });

    it('파일이 없으면 기본값', async () => {
      expect(await manager.loadConfig()).toEqual(DEFAULT_CONFIG);
      expect(manager.getConfig()).toEqual(DEFAULT_CONFIG);
    });

    it('set으로 저장하고 다시 읽음', () => {
      manager.set('jobs', '8');
      manager.set('trusted', 'no');

      expect(manager.getConfig()).toEqual({ ...DEFAULT_CONFIG, jobs: 8, trusted: false });
      expect(fs.readJsonSync(path.join(dir, 'settings.json'))).toMatchObject({ jobs: 8, trusted: false });
    });

    it('알 수 없는 키는 거부', () => {
      expect(() => manager.set('cachePath', '/tmp')).toThrow('알 수 없는 설정 키: cachePath');
    });

    it('저장된 파일의 모르는 키와 잘못된 값은 무시', async () => {
      await fs.writeJson(path.join(dir, 'settings.json'), { jobs: 0, oldKey: 1, stagingDir: '/mnt/repo' });
      expect(manager.getConfig()).toEqual({ ...DEFAULT_CONFIG, stagingDir: '/mnt/repo' });
    });

    it('손상된 파일은 기본값', async () => {
      await fs.writeFile(path.join(dir, 'settings.json'), '{broken');
      expect(manager.getConfig()).toEqual(DEFAULT_CONFIG);
    });

    it('초기화', async () => {
      manager.set('jobs', '2');
      manager.reset();
      expect(manager.getConfig()).toEqual(DEFAULT_CONFIG);
    });

    it('updateConfig', async () => {
      const updated = await manager.updateConfig({ desktopMeta: null });
      expect(updated.desktopMeta).toBeNull();
      expect((await manager.loadConfig()).desktopMeta).toBeNull();
    });
  });
});
