import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';
import { DiscoveryStrategy, RetentionBudget } from '../types';
import { resolveCredentialProvider, resolveProjectId } from './discovery/bigquery';

// 설정 파일에 저장되는 항목
export interface Settings {
  /** Simple 인덱스 기본 URL */
  simpleBase: string;
  /** 패키지 파일 기본 URL */
  packageBase: string;
  /** 패키지 목록 페이지 동시 조회 수 */
  concurrentResolve: number;
  /** HTTP 요청 타임아웃 (ms) */
  requestTimeout: number;
  logLevel: string;
  /** BigQuery 인기 패키지 모드 */
  bqQuery: boolean;
  /** 패키지별 최근 N개 버전만 유지 */
  keepRecent?: number;
  /** 인덱스 앞부분만 스캔 */
  debug: boolean;
}

// 기본 설정값
export const DEFAULT_SETTINGS: Settings = {
  simpleBase: 'https://mirrors.tuna.tsinghua.edu.cn/pypi/web/simple',
  packageBase: 'https://mirrors.tuna.tsinghua.edu.cn/pypi/web/packages',
  concurrentResolve: 64,
  requestTimeout: 30000,
  logLevel: 'info',
  bqQuery: false,
  debug: false,
};

// 설정 키 설명 (config list 출력용)
export const SETTING_DESCRIPTIONS: Record<keyof Settings, string> = {
  simpleBase: 'Simple 인덱스 기본 URL',
  packageBase: '패키지 파일 기본 URL',
  concurrentResolve: '동시 조회 수',
  requestTimeout: '요청 타임아웃 (ms)',
  logLevel: '로그 레벨',
  bqQuery: 'BigQuery 인기 패키지 모드',
  keepRecent: '패키지별 유지 버전 수',
  debug: '디버그 모드 (인덱스 일부만 스캔)',
};

// CLI에서 넘어오는 덮어쓰기 값
export type SettingsOverrides = Partial<Settings>;

/**
 * 한 번의 스냅샷 실행에 필요한 검증된 설정
 */
export interface SnapshotConfig {
  simpleBase: string;
  packageBase: string;
  strategy: DiscoveryStrategy;
  retention?: RetentionBudget;
  concurrentResolve: number;
  requestTimeout: number;
}

export class ConfigManager {
  private configDir: string;
  private configPath: string;
  private logsDir: string;

  constructor(configDir: string = path.join(os.homedir(), '.pypi-snapshot')) {
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
   * 설정을 동기적으로 로드합니다. 파일이 없으면 기본값을 반환합니다.
   */
  getSettings(): Settings {
    try {
      if (fs.pathExistsSync(this.configPath)) {
        const rawConfig: unknown = fs.readJsonSync(this.configPath);
        if (rawConfig && typeof rawConfig === 'object') {
          // 저장된 설정과 기본값을 병합 (새로운 설정 항목 대응)
          return { ...DEFAULT_SETTINGS, ...pickSettings(rawConfig) };
        }
      }
    } catch (error) {
      console.error('설정 파일 로드 실패, 기본값 사용:', error);
    }
    return { ...DEFAULT_SETTINGS };
  }

  /**
   * 설정값을 동기적으로 설정합니다.
   */
  set(key: string, value: unknown): void {
    if (!isSettingKey(key)) {
      throw new Error(`알 수 없는 설정 키: ${key}`);
    }
    const picked = pickSettings({ [key]: value });
    if (!(key in picked)) {
      throw new Error(`설정 '${key}'의 값 형식이 올바르지 않습니다: ${JSON.stringify(value)}`);
    }
    fs.ensureDirSync(this.configDir);
    const config = { ...this.getSettings(), ...picked };
    fs.writeJsonSync(this.configPath, config, { spaces: 2 });
  }

  /**
   * 설정을 기본값으로 초기화합니다.
   */
  reset(): void {
    fs.ensureDirSync(this.configDir);
    fs.writeJsonSync(this.configPath, DEFAULT_SETTINGS, { spaces: 2 });
  }

  /**
   * 설정 디렉토리 경로를 반환합니다.
   */
  getConfigDir(): string {
    return this.configDir;
  }

  /**
   * 로그 디렉토리 경로를 반환합니다.
   */
  getLogsDir(): string {
    return this.logsDir;
  }
}

function isSettingKey(key: string): key is keyof Settings {
  return Object.prototype.hasOwnProperty.call(SETTING_DESCRIPTIONS, key);
}

/**
 * 알려진 키 중 타입이 맞는 값만 골라냅니다.
 */
export function pickSettings(raw: object): Partial<Settings> {
  const picked: Partial<Settings> = {};
  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case 'simpleBase':
      case 'packageBase':
      case 'logLevel':
        if (typeof value === 'string') picked[key] = value;
        break;
      case 'concurrentResolve':
      case 'requestTimeout':
      case 'keepRecent':
        if (typeof value === 'number') picked[key] = value;
        break;
      case 'bqQuery':
      case 'debug':
        if (typeof value === 'boolean') picked[key] = value;
        break;
    }
  }
  return picked;
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name}은(는) 양의 정수여야 합니다: ${value}`);
  }
}

function assertHttpUrl(name: string, value: string): void {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch (error) {
    throw new Error(`${name}이(가) 올바른 URL이 아닙니다: ${value}`, { cause: error });
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new Error(`${name}은(는) http(s) URL이어야 합니다: ${value}`);
  }
}

/**
 * 저장된 설정과 CLI 옵션을 병합하고 검증합니다.
 * BigQuery 모드에서는 인증 방식과 프로젝트 ID를 여기서 한 번만 결정합니다.
 */
export function resolveSnapshotConfig(
  settings: Settings,
  overrides: SettingsOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): SnapshotConfig {
  const merged: Settings = { ...settings, ...pickSettings(overrides) };

  assertHttpUrl('simpleBase', merged.simpleBase);
  assertHttpUrl('packageBase', merged.packageBase);
  assertPositiveInteger('concurrentResolve', merged.concurrentResolve);
  assertPositiveInteger('requestTimeout', merged.requestTimeout);
  if (merged.keepRecent !== undefined) {
    assertPositiveInteger('keepRecent', merged.keepRecent);
  }

  // `{base}/` 형태로 요청하므로 끝의 슬래시는 제거
  const simpleBase = merged.simpleBase.replace(/\/+$/, '');

  const strategy: DiscoveryStrategy = merged.bqQuery
    ? {
        kind: 'popularity',
        projectId: resolveProjectId(env),
        credentials: resolveCredentialProvider(env),
        debug: merged.debug,
      }
    : { kind: 'full-index', simpleBase, debug: merged.debug };

  return {
    simpleBase,
    packageBase: merged.packageBase,
    strategy,
    retention: merged.keepRecent !== undefined ? { keepRecent: merged.keepRecent } : undefined,
    concurrentResolve: merged.concurrentResolve,
    requestTimeout: merged.requestTimeout,
  };
}

// 싱글톤 인스턴스
let configManagerInstance: ConfigManager | null = null;

export function getConfigManager(): ConfigManager {
  if (!configManagerInstance) {
    configManagerInstance = new ConfigManager();
  }
  return configManagerInstance;
}
