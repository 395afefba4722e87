import fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';
import { parse as parseIni } from 'ini';
import { ConfigError, errorMessage } from './errors';
import type { LogLevel } from '../utils/logger';
import type { RepositoryTarget } from './sync/types';

// 설정 인터페이스 정의
export interface Settings {
  /** 동시 워커 수 */
  workers: number;
  /** HTTP 요청 타임아웃 (ms) */
  timeoutMs: number;
  /** 패키지 전송 재시도 횟수 */
  retries: number;
  /** 로그 레벨 */
  logLevel: LogLevel;
  /** 저장소 목록 ini 파일 */
  configFile: string;
  /** 파일 로깅 여부 */
  fileLogging: boolean;
}

// 기본 설정값
export const DEFAULT_SETTINGS: Settings = {
  workers: 6,
  timeoutMs: 60000,
  retries: 0,
  logLevel: 'info',
  configFile: './config.ini',
  fileLogging: true,
};

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

function isSettingsKey(key: string): key is keyof Settings {
  return Object.prototype.hasOwnProperty.call(DEFAULT_SETTINGS, key);
}

export class ConfigManager {
  private configDir: string;
  private settingsPath: string;
  private logsDir: string;

  constructor(configDir: string = path.join(os.homedir(), '.repomirror')) {
    this.configDir = configDir;
    this.settingsPath = path.join(this.configDir, 'settings.json');
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
   * 설정을 로드합니다. 파일이 없으면 기본값을 사용합니다.
   * 알 수 없는 키와 타입이 맞지 않는 값은 무시합니다.
   */
  async loadSettings(): Promise<Settings> {
    if (!(await fs.pathExists(this.settingsPath))) {
      return { ...DEFAULT_SETTINGS };
    }

    let raw: unknown;
    try {
      raw = await fs.readJson(this.settingsPath);
    } catch (error) {
      throw new ConfigError(`설정 파일을 읽을 수 없습니다: ${this.settingsPath} (${errorMessage(error)})`);
    }

    const settings: Settings = { ...DEFAULT_SETTINGS };
    if (typeof raw === 'object' && raw !== null) {
      for (const [key, value] of Object.entries(raw)) {
        if (isSettingsKey(key)) {
          this.assign(settings, key, value);
        }
      }
    }
    return settings;
  }

  /**
   * 설정을 저장합니다.
   */
  async saveSettings(settings: Settings): Promise<void> {
    await this.ensureDirectories();
    await fs.writeJson(this.settingsPath, settings, { spaces: 2 });
  }

  /**
   * 설정값 하나를 변경합니다 (CLI 문자열 입력).
   */
  async setValue(key: string, value: string): Promise<Settings> {
    if (!isSettingsKey(key)) {
      throw new ConfigError(`알 수 없는 설정 키: ${key}`);
    }

    // 값 파싱 (숫자, 불리언, 문자열)
    let parsedValue: unknown = value;
    if (value === 'true') {
      parsedValue = true;
    } else if (value === 'false') {
      parsedValue = false;
    } else if (value.trim() !== '' && !isNaN(Number(value))) {
      parsedValue = Number(value);
    }

    const settings = await this.loadSettings();
    if (!this.assign(settings, key, parsedValue)) {
      throw new ConfigError(`잘못된 설정값: ${key} = ${value}`);
    }
    await this.saveSettings(settings);
    return settings;
  }

  /**
   * 설정을 기본값으로 초기화합니다.
   */
  async resetToDefaults(): Promise<Settings> {
    await this.saveSettings(DEFAULT_SETTINGS);
    return { ...DEFAULT_SETTINGS };
  }

  getLogsDir(): string {
    return this.logsDir;
  }

  getSettingsPath(): string {
    return this.settingsPath;
  }

  /**
   * 타입을 확인하고 값을 대입합니다.
   */
  private assign(settings: Settings, key: keyof Settings, value: unknown): boolean {
    switch (key) {
      case 'workers':
        if (typeof value === 'number' && Number.isInteger(value) && value >= 1) {
          settings.workers = value;
          return true;
        }
        return false;
      case 'timeoutMs':
      case 'retries':
        if (typeof value === 'number' && Number.isInteger(value) && value >= 0) {
          settings[key] = value;
          return true;
        }
        return false;
      case 'logLevel': {
        const level = LOG_LEVELS.find((l) => l === value);
        if (level) {
          settings.logLevel = level;
          return true;
        }
        return false;
      }
      case 'configFile':
        if (typeof value === 'string' && value.length > 0) {
          settings.configFile = value;
          return true;
        }
        return false;
      case 'fileLogging':
        if (typeof value === 'boolean') {
          settings.fileLogging = value;
          return true;
        }
        return false;
    }
  }
}

/**
 * ini 파일에서 동기화 대상 저장소 목록을 읽습니다.
 *
 * [epel9]
 * base_url = https://example.org/epel/9/Everything/x86_64/
 * local_dir = /srv/mirror/epel9
 */
export async function loadRepositoryTargets(configFile: string): Promise<RepositoryTarget[]> {
  if (!(await fs.pathExists(configFile))) {
    throw new ConfigError(`저장소 설정 파일이 없습니다: ${configFile}`);
  }

  const parsed: Record<string, unknown> = parseIni(await fs.readFile(configFile, 'utf-8'));
  const targets: RepositoryTarget[] = [];

  for (const [name, section] of Object.entries(parsed)) {
    // 섹션 밖의 전역 키는 무시
    if (typeof section !== 'object' || section === null) continue;

    const baseUrl = 'base_url' in section ? section.base_url : undefined;
    const localDir = 'local_dir' in section ? section.local_dir : undefined;

    if (typeof baseUrl !== 'string' || baseUrl.trim() === '') {
      throw new ConfigError(`[${name}] base_url이 없습니다`);
    }
    if (typeof localDir !== 'string' || localDir.trim() === '') {
      throw new ConfigError(`[${name}] local_dir이 없습니다`);
    }
    if (!/^https?:\/\//.test(baseUrl.trim())) {
      throw new ConfigError(`[${name}] base_url은 http(s) URL이어야 합니다: ${baseUrl}`);
    }

    targets.push({ name, baseUrl: baseUrl.trim(), localDir: path.resolve(localDir.trim()) });
  }

  return targets;
}

// 싱글톤 인스턴스
let configManagerInstance: ConfigManager | null = null;

export function getConfigManager(): ConfigManager {
  if (!configManagerInstance) {
    configManagerInstance = new ConfigManager();
  }
  return configManagerInstance;
}
