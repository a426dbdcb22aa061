/**
 * Rotation Policy
 * 純決策邏輯：是否該離開目前憑證、下一把要選誰
 *
 * 兩段門檻：
 *   - warn：達到即預先輪替（配額尚未用完就換）
 *   - emergency：達到即排除於一般選取，只有 force 才會選到
 */

import type { CredentialRecord } from '../types/credential.js';
import { MAX_CONSECUTIVE_ERRORS } from '../types/credential.js';

/**
 * 是否應該離開此憑證
 */
export function shouldRotateAway(record: CredentialRecord, warnThreshold: number): boolean {
  return record.quotaUsed >= warnThreshold || record.errorCount >= MAX_CONSECUTIVE_ERRORS;
}

/**
 * 此憑證是否可被選取
 */
export function isSelectable(
  record: CredentialRecord,
  emergencyThreshold: number,
  force: boolean = false
): boolean {
  if (!record.isActive) {
    return false;
  }
  return force || record.quotaUsed < emergencyThreshold;
}

/**
 * 從 startIndex 的下一個位置開始掃描，最多繞整個 pool 一圈（起點本身最後檢查）
 * 第一個通過篩選者勝出，不做負載排序
 * @param pool 依 index 排序、index 與陣列位置一致的紀錄
 * @returns 選中的 index，找不到則為 null
 */
export function selectNext(
  pool: readonly CredentialRecord[],
  startIndex: number,
  emergencyThreshold: number,
  force: boolean = false
): number | null {
  const size = pool.length;

  for (let step = 1; step <= size; step++) {
    const candidate = pool[(startIndex + step) % size];
    if (isSelectable(candidate, emergencyThreshold, force)) {
      return candidate.index;
    }
  }

  return null;
}
