/**
 * Credential Store
 * 憑證配額紀錄的持久化層 - 以 pool index 為鍵
 * 寫入失敗一律拋出，不吞掉（避免配額紀錄遺失）
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import type { CredentialRecord } from '../types/credential.js';
import { CredentialStoreError } from '../types/errors.js';
import { loggers } from '../lib/logger.js';

export const DEFAULT_STORE_PATH = path.join(
  os.homedir(),
  '.config',
  'quota-pool',
  'credentials.json'
);

const STORE_VERSION = 1;

/**
 * 儲存介面：最後一次寫入必須立即對下一次讀取可見
 */
export interface CredentialStore {
  get(index: number): CredentialRecord | undefined;
  upsert(record: CredentialRecord): void;
  /** 依 index 排序 */
  listAll(): CredentialRecord[];
}

interface StoreFile {
  version: number;
  records: CredentialRecord[];
}

function sortByIndex(records: CredentialRecord[]): CredentialRecord[] {
  return records.sort((a, b) => a.index - b.index);
}

function isNullableNumber(value: unknown): value is number | null {
  return value === null || typeof value === 'number';
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

/**
 * 驗證檔案中的單筆紀錄
 */
export function isCredentialRecord(value: unknown): value is CredentialRecord {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  return (
    isNonNegativeInteger(record.index) &&
    typeof record.identifier === 'string' &&
    isNonNegativeInteger(record.quotaUsed) &&
    typeof record.lastReset === 'number' &&
    isNullableNumber(record.lastUsed) &&
    typeof record.isActive === 'boolean' &&
    isNonNegativeInteger(record.errorCount) &&
    isNullableNumber(record.lastError)
  );
}

/**
 * 記憶體實作（測試與單次執行使用）
 */
export class InMemoryCredentialStore implements CredentialStore {
  private records = new Map<number, CredentialRecord>();

  constructor(initial: CredentialRecord[] = []) {
    for (const record of initial) {
      this.records.set(record.index, { ...record });
    }
  }

  get(index: number): CredentialRecord | undefined {
    const record = this.records.get(index);
    return record ? { ...record } : undefined;
  }

  upsert(record: CredentialRecord): void {
    this.records.set(record.index, { ...record });
  }

  listAll(): CredentialRecord[] {
    return sortByIndex(Array.from(this.records.values(), (r) => ({ ...r })));
  }

  remove(index: number): void {
    this.records.delete(index);
  }
}

/**
 * JSON 檔案實作
 * 建構時讀入一次，之後每次 upsert 都寫回（先寫暫存檔再 rename）
 */
export class JsonFileCredentialStore implements CredentialStore {
  private filePath: string;
  private memory: InMemoryCredentialStore;

  constructor(filePath: string = DEFAULT_STORE_PATH) {
    this.filePath = filePath;
    this.memory = new InMemoryCredentialStore(this.load());
  }

  get(index: number): CredentialRecord | undefined {
    return this.memory.get(index);
  }

  upsert(record: CredentialRecord): void {
    const previous = this.memory.get(record.index);
    this.memory.upsert(record);

    try {
      this.save();
    } catch (error) {
      // 回復記憶體狀態，讓檔案與記憶體一致
      if (previous) {
        this.memory.upsert(previous);
      } else {
        this.memory.remove(record.index);
      }
      loggers.store.error(
        '配額紀錄寫入失敗',
        error instanceof Error ? error : null,
        { credentialIndex: record.index, path: this.filePath }
      );
      throw new CredentialStoreError(`無法寫入配額紀錄: ${this.filePath}`, error);
    }
  }

  listAll(): CredentialRecord[] {
    return this.memory.listAll();
  }

  getFilePath(): string {
    return this.filePath;
  }

  /**
   * 載入紀錄檔；檔案不存在視為空
   */
  private load(): CredentialRecord[] {
    if (!fs.existsSync(this.filePath)) {
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      throw new CredentialStoreError(`無法讀取配額紀錄: ${this.filePath}`, error);
    }

    if (
      typeof parsed !== 'object' ||
      parsed === null ||
      !('records' in parsed) ||
      !Array.isArray(parsed.records)
    ) {
      throw new CredentialStoreError(`配額紀錄格式錯誤: ${this.filePath}`);
    }

    const records: CredentialRecord[] = [];
    for (const item of parsed.records) {
      if (!isCredentialRecord(item)) {
        throw new CredentialStoreError(`配額紀錄格式錯誤: ${this.filePath}`);
      }
      records.push(item);
    }

    loggers.store.debug('已載入配額紀錄', { path: this.filePath, count: records.length });
    return records;
  }

  private save(): void {
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const content: StoreFile = {
      version: STORE_VERSION,
      records: this.memory.listAll(),
    };
    const tmpPath = `${this.filePath}.tmp`;
    fs.writeFileSync(tmpPath, JSON.stringify(content, null, 2), 'utf-8');
    fs.renameSync(tmpPath, this.filePath);
  }
}
