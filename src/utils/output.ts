/**
 * Output Formatter
 * 統一輸出格式處理：json | table，以及指令錯誤的結束碼
 */

import {
  ConfigError,
  NoCredentialConfiguredError,
  NonRetryableError,
  PoolExhaustedError,
} from '../types/errors.js';

export type OutputFormat = 'json' | 'table';

/**
 * 驗證輸出格式是否有效
 */
export function isValidFormat(format: string): format is OutputFormat {
  return ['json', 'table'].includes(format);
}

/**
 * 決定實際輸出格式：指令列 --format > 設定檔 format > json
 */
export function resolveFormat(requested: unknown, configured?: OutputFormat): OutputFormat {
  if (typeof requested === 'string' && isValidFormat(requested)) {
    return requested;
  }
  return configured ?? 'json';
}

/**
 * 輸出資料到 console
 * @param tableRenderer 若為 table 格式，使用此函數渲染
 */
export function outputData(
  data: unknown,
  format: OutputFormat = 'json',
  tableRenderer?: () => string
): void {
  if (format === 'table' && tableRenderer) {
    console.log(tableRenderer());
    return;
  }
  console.log(JSON.stringify(data, null, 2));
}

/**
 * 錯誤對應的結束碼
 * 3 = 設定錯誤，2 = API / 配額錯誤，1 = 其他
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof NoCredentialConfiguredError || error instanceof ConfigError) {
    return 3;
  }
  if (error instanceof PoolExhaustedError || error instanceof NonRetryableError) {
    return 2;
  }
  return 1;
}

/**
 * 輸出錯誤訊息並設定結束碼
 */
export function reportError(prefix: string, error: unknown): void {
  const errorMsg = error instanceof Error ? error.message : String(error);
  console.error(`❌ ${prefix}: ${errorMsg}`);
  process.exitCode = exitCodeFor(error);
}
