/**
 * Pool Factory
 * 依 ConfigService 建立 CLI 共用的 KeyPoolManager
 */

import { KeyPoolManager } from '../services/key-pool.js';
import { JsonFileCredentialStore, type CredentialStore } from '../services/credential-store.js';
import { createHttpErrorClassifier } from '../services/error-classifier.js';
import { getConfigService } from '../services/config.js';
import { NoCredentialConfiguredError } from '../types/errors.js';

export interface PoolContext {
  pool: KeyPoolManager;
  store: CredentialStore;
}

let cachedContext: PoolContext | null = null;

/**
 * 取得 pool（首次呼叫時建立）
 * @throws NoCredentialConfiguredError 未設定 API Key
 * @throws ConfigError 門檻設定不合法
 */
export function getPoolContext(): PoolContext {
  if (cachedContext) {
    return cachedContext;
  }

  const settings = getConfigService().getPoolSettings();
  if (settings.keys.length === 0) {
    throw new NoCredentialConfiguredError(
      '未設定 API Key，請設定環境變數 QUOTA_POOL_KEYS 或設定檔 keys'
    );
  }

  const store = new JsonFileCredentialStore(settings.storePath);
  const pool = new KeyPoolManager(
    settings.keys,
    store,
    {
      dailyLimit: settings.dailyLimit,
      warnThreshold: settings.warnThreshold,
      emergencyThreshold: settings.emergencyThreshold,
      lowRemainingThreshold: settings.lowRemainingThreshold,
    },
    createHttpErrorClassifier()
  );

  cachedContext = { pool, store };
  return cachedContext;
}

/**
 * 指定 pool（用於測試），傳入 null 清除快取
 */
export function setPoolContext(context: PoolContext | null): void {
  cachedContext = context;
}
