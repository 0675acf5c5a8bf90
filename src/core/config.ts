import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';

// 설정 인터페이스 정의
export interface Config {
  // 빌드 설정
  repoDir: string;
  aptCacheDir: string;
  /** 워커 수. null이면 CPU 수 */
  jobs: number | null;
  /** 소스 엔트리에 [trusted=yes] 포함 여부 */
  trusted: boolean;

  // 설치 설정
  stagingDir: string;
  aptDir: string;
  aptListsDir: string;
  upgradeLogDir: string;
  /** 업그레이드 후 설치할 데스크톱 메타 패키지. null이면 건너뜀 */
  desktopMeta: string | null;

  // 기타 설정
  logLevel: 'error' | 'warn' | 'info' | 'debug';
}

export type ConfigKey = keyof Config;

// 기본 설정값
const DEFAULT_CONFIG: Config = {
  repoDir: path.join(os.homedir(), 'offline-repo'),
  aptCacheDir: '/var/cache/apt/archives',
  jobs: null,
  trusted: true,
  stagingDir: '/opt/offline-repo',
  aptDir: '/etc/apt',
  aptListsDir: '/var/lib/apt/lists',
  upgradeLogDir: '/var/log',
  desktopMeta: 'ubuntu-desktop',
  logLevel: 'info',
};

export const CONFIG_KEYS = Object.keys(DEFAULT_CONFIG) as ConfigKey[];

const LOG_LEVELS: Config['logLevel'][] = ['error', 'warn', 'info', 'debug'];

export function isConfigKey(key: string): key is ConfigKey {
  return (CONFIG_KEYS as string[]).includes(key);
}

/**
 * CLI 문자열 값을 설정 키에 맞는 타입으로 변환
 */
export function parseConfigValue<K extends ConfigKey>(key: K, raw: string): Config[K];
export function parseConfigValue(key: ConfigKey, raw: string): Config[ConfigKey] {
  switch (key) {
    case 'jobs': {
      if (raw === 'auto' || raw === '') return null;
      const jobs = Number(raw);
      if (!Number.isInteger(jobs) || jobs < 1) {
        throw new Error(`jobs는 1 이상의 정수 또는 auto여야 합니다: ${raw}`);
      }
      return jobs;
    }
    case 'trusted':
      if (['yes', 'true', '1'].includes(raw)) return true;
      if (['no', 'false', '0'].includes(raw)) return false;
      throw new Error(`trusted는 yes 또는 no여야 합니다: ${raw}`);
    case 'desktopMeta':
      return raw === '' || raw === 'none' ? null : raw;
    case 'logLevel': {
      const level = LOG_LEVELS.find((l) => l === raw);
      if (!level) {
        throw new Error(`logLevel은 ${LOG_LEVELS.join(', ')} 중 하나여야 합니다: ${raw}`);
      }
      return level;
    }
    default:
      if (!raw) {
        throw new Error(`${key} 값이 비어 있습니다`);
      }
      return path.resolve(raw);
  }
}

/**
 * 저장된 JSON에서 알려진 키만 골라 기본값과 병합
 */
function mergeWithDefaults(raw: unknown): Config {
  const config: Config = { ...DEFAULT_CONFIG };
  if (typeof raw !== 'object' || raw === null) {
    return config;
  }

  for (const [key, value] of Object.entries(raw)) {
    if (!isConfigKey(key)) continue;
    if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      try {
        Object.assign(config, { [key]: parseConfigValue(key, value === null ? '' : String(value)) });
      } catch {
        // 잘못된 값은 기본값 유지
      }
    }
  }
  return config;
}

export class ConfigManager {
  private configDir: string;
  private configPath: string;
  private logsDir: string;

  constructor(configDir: string = process.env.DEBSNAP_HOME || path.join(os.homedir(), '.debsnap')) {
    this.configDir = configDir;
    this.configPath = path.join(this.configDir, 'settings.json');
    this.logsDir = path.join(this.configDir, 'logs');
  }

  /**
   * 필요한 디렉토리들을 생성합니다.
   */
  async ensureDirectories(): Promise<void> {
    await fs.ensureDir(this.configDir);
    await fs.ensureDir(this.logsDir);
  }

  /**
   * 설정을 로드합니다. 파일이 없으면 기본값을 반환합니다.
   */
  async loadConfig(): Promise<Config> {
    if (await fs.pathExists(this.configPath)) {
      // 저장된 설정과 기본값을 병합 (새로운 설정 항목 대응)
      return mergeWithDefaults(await fs.readJson(this.configPath));
    }
    return { ...DEFAULT_CONFIG };
  }

  /**
   * 설정을 저장합니다.
   */
  async saveConfig(config: Config): Promise<void> {
    await this.ensureDirectories();
    await fs.writeJson(this.configPath, config, { spaces: 2 });
  }

  /**
   * 특정 설정값을 업데이트합니다.
   */
  async updateConfig(updates: Partial<Config>): Promise<Config> {
    const currentConfig = await this.loadConfig();
    const newConfig = { ...currentConfig, ...updates };
    await this.saveConfig(newConfig);
    return newConfig;
  }

  getLogsDir(): string {
    return this.logsDir;
  }

  /**
   * 설정을 동기적으로 로드합니다 (CLI용).
   */
  getConfig(): Config {
    try {
      if (fs.pathExistsSync(this.configPath)) {
        return mergeWithDefaults(fs.readJsonSync(this.configPath));
      }
    } catch {
      // 손상된 설정 파일은 기본값으로 대체
    }
    return { ...DEFAULT_CONFIG };
  }

  /**
   * 설정값을 동기적으로 설정합니다 (CLI용).
   */
  set(key: string, raw: string): Config {
    if (!isConfigKey(key)) {
      throw new Error(`알 수 없는 설정 키: ${key}`);
    }
    const config = { ...this.getConfig(), [key]: parseConfigValue(key, raw) };
    fs.ensureDirSync(this.configDir);
    fs.writeJsonSync(this.configPath, config, { spaces: 2 });
    return config;
  }

  /**
   * 설정을 동기적으로 초기화합니다 (CLI용).
   */
  reset(): void {
    fs.ensureDirSync(this.configDir);
    fs.writeJsonSync(this.configPath, DEFAULT_CONFIG, { spaces: 2 });
  }
}

export { DEFAULT_CONFIG };

// 싱글톤 인스턴스
let configManagerInstance: ConfigManager | null = null;

export function getConfigManager(): ConfigManager {
  if (!configManagerInstance) {
    configManagerInstance = new ConfigManager();
  }
  return configManagerInstance;
}
