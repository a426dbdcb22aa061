/**
 * Credential Pool Types
 * 多組 API Key 共用每日配額：記錄、狀態與輪替結果
 */

/**
 * 單一憑證的配額紀錄（以 pool index 為鍵）
 */
export interface CredentialRecord {
  /** Pool 中的位置，依設定順序分配 */
  index: number;
  /** 顯示用識別碼（secret 末 6 碼），絕不是完整 secret */
  identifier: string;
  /** 上次重置後已使用的配額單位 */
  quotaUsed: number;
  /** 上次重置時間（epoch ms） */
  lastReset: number;
  /** 最後一次成功扣額時間 */
  lastUsed: number | null;
  /** false = 永久停用，需手動重新啟用 */
  isActive: boolean;
  /** 連續失敗次數，成功一次即歸零 */
  errorCount: number;
  /** 最後一次失敗時間 */
  lastError: number | null;
}

/**
 * 交給遠端呼叫閉包的憑證
 */
export interface PooledCredential {
  index: number;
  identifier: string;
  secret: string;
}

/**
 * 配額門檻（與呼叫 cost 同一單位）
 */
export interface QuotaThresholds {
  /** 每日配額上限 */
  dailyLimit: number;
  /** 達到即預先輪替 */
  warnThreshold: number;
  /** 達到即排除於非強制選取 */
  emergencyThreshold: number;
}

export interface KeyPoolOptions extends QuotaThresholds {
  /** remaining 低於此值視為 low（預設 500） */
  lowRemainingThreshold?: number;
  /** 時鐘（預設 Date.now） */
  now?: () => number;
}

/**
 * 失敗分類
 */
export type FailureKind =
  | 'quotaExceeded'
  | 'invalidCredential'
  | 'transient'
  | 'nonRetryable';

/**
 * recordFailure 之後 executor 應採取的動作
 * - rotated: 已換到下一把（或同一把）可用憑證
 * - retry: 未輪替，可在同一憑證重試
 * - exhausted: 找不到可用憑證
 * - abort: 與憑證無關，不重試
 */
export type FailureAction = 'rotated' | 'retry' | 'exhausted' | 'abort';

export interface FailureOutcome {
  kind: FailureKind;
  action: FailureAction;
}

export type CredentialHealth = 'ok' | 'low' | 'exhausted' | 'disabled';

/**
 * 單一憑證狀態（唯一對外讀取介面）
 */
export interface CredentialStatus {
  index: number;
  identifier: string;
  quotaUsed: number;
  remaining: number;
  isActive: boolean;
  isCurrent: boolean;
  lastUsed: number | null;
  lastError: number | null;
  errorCount: number;
  health: CredentialHealth;
}

/**
 * Pool 整體摘要
 */
export interface PoolSummary {
  credentialCount: number;
  usableCount: number;
  activeIndex: number;
  totalUsed: number;
  totalCapacity: number;
  /** 0-100，保留一位小數 */
  usagePercent: number;
}

/** 連續失敗達此次數即輪替 */
export const MAX_CONSECUTIVE_ERRORS = 3;

/** 預設門檻 */
export const DEFAULT_THRESHOLDS: QuotaThresholds = {
  dailyLimit: 10000,
  warnThreshold: 8000,
  emergencyThreshold: 9500,
};

export const DEFAULT_LOW_REMAINING = 500;
