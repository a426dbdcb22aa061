/**
 * Credential Pool Errors
 * 呼叫端只會看到 PoolExhausted / NonRetryable / NoCredentialConfigured，
 * 其他錯誤由 pool 內部輪替處理
 */

/**
 * 未設定任何憑證（啟動設定錯誤）
 */
export class NoCredentialConfiguredError extends Error {
  public readonly code = 'NO_CREDENTIAL_CONFIGURED';

  constructor(message: string = '未設定任何 API Key') {
    super(message);
    this.name = 'NoCredentialConfiguredError';
  }
}

/**
 * 所有憑證都不可用，本次呼叫終止
 */
export class PoolExhaustedError extends Error {
  public readonly code = 'POOL_EXHAUSTED';
  public readonly lastError: unknown;
  public readonly attempts: number;

  constructor(message: string, lastError: unknown, attempts: number) {
    super(message);
    this.name = 'PoolExhaustedError';
    this.lastError = lastError;
    this.attempts = attempts;
  }
}

/**
 * 與憑證無關的錯誤，輪替也無法修復
 */
export class NonRetryableError extends Error {
  public readonly code = 'NON_RETRYABLE';
  public readonly originalError: unknown;

  constructor(message: string, originalError: unknown) {
    super(message);
    this.name = 'NonRetryableError';
    this.originalError = originalError;
  }
}

/**
 * 傳輸層可拋出的已分類錯誤：配額用盡
 */
export class QuotaExceededError extends Error {
  public readonly code = 'QUOTA_EXCEEDED';

  constructor(message: string = '配額已用盡') {
    super(message);
    this.name = 'QuotaExceededError';
  }
}

/**
 * 傳輸層可拋出的已分類錯誤：憑證無效
 */
export class CredentialInvalidError extends Error {
  public readonly code = 'CREDENTIAL_INVALID';

  constructor(message: string = 'API Key 無效') {
    super(message);
    this.name = 'CredentialInvalidError';
  }
}

/**
 * 傳輸層可拋出的已分類錯誤：與憑證相關的暫時性失敗
 */
export class TransientCredentialError extends Error {
  public readonly code = 'TRANSIENT_CREDENTIAL_ERROR';
  public readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'TransientCredentialError';
    this.status = status;
  }
}

/**
 * 儲存層讀寫失敗
 */
export class CredentialStoreError extends Error {
  public readonly code = 'CREDENTIAL_STORE_ERROR';
  public readonly originalError: unknown;

  constructor(message: string, originalError?: unknown) {
    super(message);
    this.name = 'CredentialStoreError';
    this.originalError = originalError;
  }
}

/**
 * 設定值不合法
 */
export class ConfigError extends Error {
  public readonly code = 'INVALID_CONFIG';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * 指定的 index 不在 pool 中
 */
export class UnknownCredentialError extends Error {
  public readonly code = 'UNKNOWN_CREDENTIAL';
  public readonly index: number;

  constructor(index: number) {
    super(`找不到 index 為 ${index} 的 API Key`);
    this.name = 'UnknownCredentialError';
    this.index = index;
  }
}
