/**
 * Config Service
 * 設定管理服務 - 處理設定檔讀寫與環境變數
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import type { AppConfig, ConfigKey } from '../types/config.js';
import type { QuotaThresholds } from '../types/credential.js';
import { DEFAULT_LOW_REMAINING, DEFAULT_THRESHOLDS } from '../types/credential.js';
import { ConfigError } from '../types/errors.js';
import { DEFAULT_STORE_PATH } from './credential-store.js';
import { loggers } from '../lib/logger.js';

const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.config', 'quota-pool');
const DEFAULT_CONFIG_FILE = 'config.json';

/**
 * 門檻必須為正整數，且 warn ≤ emergency ≤ dailyLimit
 * @throws ConfigError
 */
export function assertValidThresholds(thresholds: QuotaThresholds): void {
  const entries = Object.entries({
    dailyLimit: thresholds.dailyLimit,
    warnThreshold: thresholds.warnThreshold,
    emergencyThreshold: thresholds.emergencyThreshold,
  });
  for (const [name, value] of entries) {
    if (!Number.isInteger(value) || value <= 0) {
      throw new ConfigError(`${name} 必須是正整數: ${value}`);
    }
  }

  if (thresholds.warnThreshold > thresholds.emergencyThreshold) {
    throw new ConfigError('warnThreshold 不可大於 emergencyThreshold');
  }
  if (thresholds.emergencyThreshold > thresholds.dailyLimit) {
    throw new ConfigError('emergencyThreshold 不可大於 dailyLimit');
  }
}

/**
 * 去除空白項，index 依非空白 Key 的順序指派（空白項不佔位）
 * 空白項後面還有 Key 時，後面的 index 會往前遞補，記一筆警告
 */
function compactKeys(entries: string[]): string[] {
  const trimmed = entries.map((key) => key.trim());

  let lastKeyPosition = -1;
  trimmed.forEach((key, position) => {
    if (key.length > 0) lastKeyPosition = position;
  });
  const shifting = trimmed.flatMap((key, position) =>
    key.length === 0 && position < lastKeyPosition ? [position] : []
  );
  if (shifting.length > 0) {
    loggers.config.warn('已略過空白的 API Key，其後的 Key index 往前遞補', {
      blankPositions: shifting,
    });
  }

  return trimmed.filter((key) => key.length > 0);
}

/**
 * 解析逗號分隔的 API Keys
 */
export function parseKeyList(value: string): string[] {
  return compactKeys(value.split(','));
}

/**
 * 解析整數環境變數
 * @throws ConfigError 不是整數
 */
function parseIntEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${name} 必須是整數: ${raw}`);
  }
  return value;
}

function optionalInteger(raw: Record<string, unknown>, key: string): number | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ConfigError(`設定值 ${key} 必須是整數`);
  }
  return value;
}

/**
 * 驗證設定檔內容，只保留已知欄位
 * @throws ConfigError 欄位型別錯誤
 */
export function parseAppConfig(raw: Record<string, unknown>): AppConfig {
  const config: AppConfig = {
    dailyLimit: optionalInteger(raw, 'dailyLimit'),
    warnThreshold: optionalInteger(raw, 'warnThreshold'),
    emergencyThreshold: optionalInteger(raw, 'emergencyThreshold'),
    lowRemainingThreshold: optionalInteger(raw, 'lowRemainingThreshold'),
  };

  if (raw.keys !== undefined) {
    if (!Array.isArray(raw.keys) || !raw.keys.every((key) => typeof key === 'string')) {
      throw new ConfigError('設定值 keys 必須是字串陣列');
    }
    config.keys = raw.keys;
  }

  if (raw.storePath !== undefined) {
    if (typeof raw.storePath !== 'string') {
      throw new ConfigError('設定值 storePath 必須是字串');
    }
    config.storePath = raw.storePath;
  }

  if (raw.format !== undefined) {
    if (raw.format !== 'json' && raw.format !== 'table') {
      throw new ConfigError('設定值 format 必須是 json 或 table');
    }
    config.format = raw.format;
  }

  return config;
}

export interface PoolSettings extends QuotaThresholds {
  keys: string[];
  lowRemainingThreshold: number;
  storePath: string;
}

export class ConfigService {
  private configPath: string;
  private config: AppConfig;

  constructor(configPath?: string) {
    this.configPath = configPath || path.join(DEFAULT_CONFIG_DIR, DEFAULT_CONFIG_FILE);
    this.config = this.load();
  }

  /**
   * 載入設定檔；不存在時使用空設定
   */
  private load(): AppConfig {
    if (!fs.existsSync(this.configPath)) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.configPath, 'utf-8'));
    } catch (error) {
      loggers.config.error(
        '設定檔讀取失敗',
        error instanceof Error ? error : null,
        { path: this.configPath }
      );
      throw new ConfigError(`無法解析設定檔: ${this.configPath}`);
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new ConfigError(`設定檔必須是 JSON 物件: ${this.configPath}`);
    }
    return parseAppConfig({ ...parsed });
  }

  get<K extends ConfigKey>(key: K): AppConfig[K] {
    return this.config[key];
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * 取得所有 API Key（優先環境變數 QUOTA_POOL_KEYS）
   */
  getApiKeys(): string[] {
    const envValue = process.env.QUOTA_POOL_KEYS;
    if (envValue && envValue.trim().length > 0) {
      return parseKeyList(envValue);
    }
    return compactKeys(this.config.keys ?? []);
  }

  hasMultipleKeys(): boolean {
    return this.getApiKeys().length > 1;
  }

  /**
   * 取得配額門檻（環境變數 > 設定檔 > 預設值）
   * @throws ConfigError 門檻不合法
   */
  getThresholds(): QuotaThresholds {
    const thresholds: QuotaThresholds = {
      dailyLimit:
        parseIntEnv('QUOTA_DAILY_LIMIT') ?? this.config.dailyLimit ?? DEFAULT_THRESHOLDS.dailyLimit,
      warnThreshold:
        parseIntEnv('QUOTA_WARN_THRESHOLD') ??
        this.config.warnThreshold ??
        DEFAULT_THRESHOLDS.warnThreshold,
      emergencyThreshold:
        parseIntEnv('QUOTA_EMERGENCY_THRESHOLD') ??
        this.config.emergencyThreshold ??
        DEFAULT_THRESHOLDS.emergencyThreshold,
    };
    assertValidThresholds(thresholds);
    return thresholds;
  }

  getLowRemainingThreshold(): number {
    return (
      parseIntEnv('QUOTA_LOW_REMAINING') ??
      this.config.lowRemainingThreshold ??
      DEFAULT_LOW_REMAINING
    );
  }

  getStorePath(): string {
    const envValue = process.env.QUOTA_STORE_PATH;
    if (envValue && envValue.length > 0) {
      return envValue;
    }
    return this.config.storePath || DEFAULT_STORE_PATH;
  }

  /**
   * 建立 pool 所需的完整設定
   */
  getPoolSettings(): PoolSettings {
    return {
      keys: this.getApiKeys(),
      ...this.getThresholds(),
      lowRemainingThreshold: this.getLowRemainingThreshold(),
      storePath: this.getStorePath(),
    };
  }
}

// 預設實例
let defaultInstance: ConfigService | null = null;

export function getConfigService(): ConfigService {
  if (!defaultInstance) {
    defaultInstance = new ConfigService();
  }
  return defaultInstance;
}

/**
 * 指定設定（用於測試），傳入 null 清除快取
 */
export function setConfigService(service: ConfigService | null): void {
  defaultInstance = service;
}
