/**
 * 設定檔結構
 */
export interface AppConfig {
  /** API Keys（依順序決定 pool index） */
  keys?: string[];
  /** 每日配額上限 */
  dailyLimit?: number;
  /** 預先輪替門檻 */
  warnThreshold?: number;
  /** 緊急門檻 */
  emergencyThreshold?: number;
  /** remaining 低於此值顯示為 low */
  lowRemainingThreshold?: number;
  /** 配額紀錄檔路徑 */
  storePath?: string;
  /** 預設輸出格式 */
  format?: 'json' | 'table';
}

/**
 * 設定鍵值
 */
export type ConfigKey = keyof AppConfig;
