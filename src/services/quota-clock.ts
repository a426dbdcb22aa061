/**
 * Quota Clock
 * 每日配額於 UTC 午夜重置；採讀取時惰性判斷，不需背景排程
 */

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * 取得 UTC 日序號（自 epoch 起第幾天）
 */
export function utcDayNumber(epochMs: number): number {
  return Math.floor(epochMs / DAY_MS);
}

/**
 * now 的 UTC 日期是否晚於 lastReset 的 UTC 日期
 */
export function isResetDue(lastReset: number, now: number): boolean {
  return utcDayNumber(now) > utcDayNumber(lastReset);
}

/**
 * 下一次重置時間（下一個 UTC 午夜）
 */
export function nextResetAt(now: number): number {
  return (utcDayNumber(now) + 1) * DAY_MS;
}

export interface TimeUntilReset {
  ms: number;
  hours: number;
  minutes: number;
}

/**
 * 距離下次重置還有多久
 */
export function timeUntilReset(now: number): TimeUntilReset {
  const ms = nextResetAt(now) - now;
  return {
    ms,
    hours: Math.floor(ms / (60 * 60 * 1000)),
    minutes: Math.floor((ms % (60 * 60 * 1000)) / (60 * 1000)),
  };
}
