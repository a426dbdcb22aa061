/**
 * Key Pool Manager
 * 持有目前使用中的憑證指標，是唯一能修改 CredentialRecord 的元件
 *
 * 狀態只有一個：activeIndex（不持久化，啟動時為 0）
 * 轉換只來自 RotationPolicy 的決策或外部強制輪替，沒有背景排程
 */

import type {
  CredentialRecord,
  CredentialStatus,
  CredentialHealth,
  FailureKind,
  FailureOutcome,
  KeyPoolOptions,
  PoolSummary,
  QuotaThresholds,
} from '../types/credential.js';
import { DEFAULT_LOW_REMAINING } from '../types/credential.js';
import { NoCredentialConfiguredError, UnknownCredentialError } from '../types/errors.js';
import type { CredentialStore } from './credential-store.js';
import { isResetDue } from './quota-clock.js';
import { isSelectable, selectNext, shouldRotateAway } from './rotation-policy.js';
import { defaultClassifier, type ErrorClassifier } from './error-classifier.js';
import { assertValidThresholds } from './config.js';
import { loggers } from '../lib/logger.js';
import {
  recordCharge,
  recordFailureKind,
  recordRotation,
  type RotationReason,
} from '../lib/metrics.js';

const logger = loggers.pool;

/**
 * 顯示用識別碼：secret 末 6 碼，太短則完全遮蔽
 */
export function toIdentifier(secret: string): string {
  return secret.length > 6 ? secret.slice(-6) : '***';
}

export class KeyPoolManager {
  private secrets: string[];
  private store: CredentialStore;
  private classifier: ErrorClassifier;
  private thresholds: QuotaThresholds;
  private lowRemainingThreshold: number;
  private now: () => number;
  private activeIndex = 0;

  constructor(
    secrets: string[],
    store: CredentialStore,
    options: KeyPoolOptions,
    classifier: ErrorClassifier = defaultClassifier
  ) {
    assertValidThresholds(options);

    this.secrets = [...secrets];
    this.store = store;
    this.classifier = classifier;
    this.thresholds = {
      dailyLimit: options.dailyLimit,
      warnThreshold: options.warnThreshold,
      emergencyThreshold: options.emergencyThreshold,
    };
    this.lowRemainingThreshold = options.lowRemainingThreshold ?? DEFAULT_LOW_REMAINING;
    this.now = options.now ?? (() => Date.now());

    this.initializeRecords();
  }

  /**
   * 為每把設定中的憑證建立紀錄（已存在則只做惰性重置）
   */
  private initializeRecords(): void {
    const now = this.now();

    this.secrets.forEach((secret, index) => {
      if (this.store.get(index)) {
        this.loadRecord(index);
        return;
      }

      this.store.upsert({
        index,
        identifier: toIdentifier(secret),
        quotaUsed: 0,
        lastReset: now,
        lastUsed: null,
        isActive: true,
        errorCount: 0,
        lastError: null,
      });
      logger.info('建立憑證配額紀錄', { credentialIndex: index, identifier: toIdentifier(secret) });
    });
  }

  /**
   * 讀取紀錄並套用惰性重置
   */
  private loadRecord(index: number): CredentialRecord {
    const record = this.store.get(index);
    if (!record) {
      throw new UnknownCredentialError(index);
    }

    const now = this.now();
    if (!isResetDue(record.lastReset, now)) {
      return record;
    }

    const reset: CredentialRecord = {
      ...record,
      quotaUsed: 0,
      errorCount: 0,
      lastReset: now,
    };
    this.store.upsert(reset);
    logger.info('每日配額已重置', {
      credentialIndex: index,
      identifier: record.identifier,
      previousQuotaUsed: record.quotaUsed,
    });
    return reset;
  }

  /**
   * 目前 pool 的快照（已套用惰性重置，index 與陣列位置一致）
   */
  private loadPool(): CredentialRecord[] {
    return this.secrets.map((_, index) => this.loadRecord(index));
  }

  private assertKnownIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.secrets.length) {
      throw new UnknownCredentialError(index);
    }
  }

  /**
   * 取得目前使用中的憑證紀錄
   * @throws NoCredentialConfiguredError pool 為空
   */
  currentCredential(): CredentialRecord {
    if (this.secrets.length === 0) {
      throw new NoCredentialConfiguredError();
    }
    return this.loadRecord(this.activeIndex);
  }

  /**
   * 取得可以拿去發送請求的憑證
   * 目前指標若已停用或超過 emergency 門檻，先輪替再回傳
   * @returns null 表示 pool 中沒有任何可選取的憑證
   * @throws NoCredentialConfiguredError pool 為空
   */
  acquireCredential(): CredentialRecord | null {
    const record = this.currentCredential();
    if (isSelectable(record, this.thresholds.emergencyThreshold)) {
      return record;
    }

    logger.warn('目前的 API Key 不可用，改選下一把', {
      credentialIndex: record.index,
      identifier: record.identifier,
      isActive: record.isActive,
      quotaUsed: record.quotaUsed,
    });
    if (!this.rotateWithReason(false, 'unusable')) {
      return null;
    }
    return this.loadRecord(this.activeIndex);
  }

  /**
   * 取得指定 index 的 secret（僅供 executor 交給遠端呼叫）
   */
  secretOf(index: number): string {
    this.assertKnownIndex(index);
    return this.secrets[index];
  }

  getActiveIndex(): number {
    return this.activeIndex;
  }

  size(): number {
    return this.secrets.length;
  }

  getThresholds(): QuotaThresholds {
    return { ...this.thresholds };
  }

  /**
   * 成功呼叫後扣除配額
   * 扣額後若達 warn 門檻或連續錯誤上限，預先輪替（影響的是下一次呼叫）
   * @param index 實際使用的憑證（預設為目前使用中者）
   */
  chargeUsage(units: number, index: number = this.activeIndex): void {
    if (!Number.isInteger(units) || units < 0) {
      throw new RangeError(`配額單位必須是非負整數: ${units}`);
    }
    this.assertKnownIndex(index);

    const record = this.loadRecord(index);
    const charged: CredentialRecord = {
      ...record,
      quotaUsed: record.quotaUsed + units,
      lastUsed: this.now(),
      errorCount: 0,
    };
    this.store.upsert(charged);
    recordCharge(index, units, charged.quotaUsed);

    logger.debug('已扣除配額', {
      credentialIndex: index,
      identifier: charged.identifier,
      units,
      quotaUsed: charged.quotaUsed,
      remaining: this.thresholds.dailyLimit - charged.quotaUsed,
    });

    // 其他呼叫者可能已經換走，這時不再從舊位置輪替
    if (index === this.activeIndex && shouldRotateAway(charged, this.thresholds.warnThreshold)) {
      logger.info('配額達預警門檻，預先輪替', {
        credentialIndex: index,
        identifier: charged.identifier,
        quotaUsed: charged.quotaUsed,
      });
      this.rotateWithReason(false, 'preemptive');
    }
  }

  /**
   * 輪替到下一把可用憑證
   * @param force 是否允許選取超過 emergency 門檻（仍低於上限）的憑證
   * @returns false 表示整個 pool 已無可用憑證，狀態不變
   */
  rotate(force: boolean = false): boolean {
    return this.rotateWithReason(force, force ? 'manual' : 'preemptive');
  }

  private rotateWithReason(force: boolean, reason: RotationReason): boolean {
    if (this.secrets.length === 0) {
      return false;
    }

    const pool = this.loadPool();
    const next = selectNext(pool, this.activeIndex, this.thresholds.emergencyThreshold, force);
    recordRotation(reason, next !== null);

    if (next === null) {
      logger.error('沒有剩餘配額的可用 API Key', null, {
        fromIndex: this.activeIndex,
        force,
        reason,
      });
      return false;
    }

    const from = this.activeIndex;
    this.activeIndex = next;
    logger.info('已輪替 API Key', {
      fromIndex: from,
      toIndex: next,
      identifier: pool[next].identifier,
      quotaUsed: pool[next].quotaUsed,
      dailyLimit: this.thresholds.dailyLimit,
      force,
      reason,
    });
    return true;
  }

  /**
   * 記錄一次失敗並依分類決定是否輪替
   * @param index 實際使用的憑證（預設為目前使用中者）
   */
  recordFailure(error: unknown, index: number = this.activeIndex): FailureOutcome {
    const kind: FailureKind = this.classifier(error);
    if (kind === 'nonRetryable') {
      return { kind, action: 'abort' };
    }

    this.assertKnownIndex(index);
    const record = this.loadRecord(index);
    const failed: CredentialRecord = {
      ...record,
      errorCount: record.errorCount + 1,
      lastError: this.now(),
    };
    recordFailureKind(index, kind);

    const context = {
      credentialIndex: index,
      identifier: record.identifier,
      errorCount: failed.errorCount,
    };

    switch (kind) {
      case 'quotaExceeded':
        // 固定為上限，本週期內不再被選取
        failed.quotaUsed = this.thresholds.dailyLimit;
        this.store.upsert(failed);
        logger.warn('API Key 配額已用盡', context);
        return this.rotateAfterFailure(kind, index, 'quota_exceeded');

      case 'invalidCredential':
        failed.isActive = false;
        this.store.upsert(failed);
        logger.error('API Key 無效，已停用', null, context);
        return this.rotateAfterFailure(kind, index, 'invalid_credential');

      case 'transient':
        this.store.upsert(failed);
        logger.warn('API Key 呼叫失敗', context);
        if (shouldRotateAway(failed, this.thresholds.warnThreshold)) {
          return this.rotateAfterFailure(kind, index, 'errors');
        }
        return { kind, action: 'retry' };
    }
  }

  private rotateAfterFailure(
    kind: FailureKind,
    index: number,
    reason: RotationReason
  ): FailureOutcome {
    if (index !== this.activeIndex) {
      // 已被其他呼叫者換走，直接用新的 active 重試
      return { kind, action: 'rotated' };
    }
    const rotated = this.rotateWithReason(false, reason);
    return { kind, action: rotated ? 'rotated' : 'exhausted' };
  }

  /**
   * 手動重新啟用憑證（同時清除連續錯誤）
   */
  enable(index: number): CredentialRecord {
    this.assertKnownIndex(index);
    const record: CredentialRecord = { ...this.loadRecord(index), isActive: true, errorCount: 0 };
    this.store.upsert(record);
    logger.info('已重新啟用 API Key', { credentialIndex: index, identifier: record.identifier });
    return record;
  }

  /**
   * 手動停用憑證
   * 停用的是目前使用中者時立即換走；找不到替代時指標不動，由 acquireCredential 擋下
   */
  disable(index: number): CredentialRecord {
    this.assertKnownIndex(index);
    const record: CredentialRecord = { ...this.loadRecord(index), isActive: false };
    this.store.upsert(record);
    logger.info('已停用 API Key', { credentialIndex: index, identifier: record.identifier });

    if (index === this.activeIndex) {
      this.rotateWithReason(false, 'manual');
    }
    return record;
  }

  /**
   * 手動重置所有配額（不影響 isActive）
   */
  resetAll(): void {
    const now = this.now();
    for (const record of this.loadPool()) {
      this.store.upsert({ ...record, quotaUsed: 0, errorCount: 0, lastReset: now });
    }
    logger.info('已手動重置所有配額', { count: this.secrets.length });
  }

  private healthOf(record: CredentialRecord, remaining: number): CredentialHealth {
    if (!record.isActive) return 'disabled';
    if (remaining === 0) return 'exhausted';
    if (remaining < this.lowRemainingThreshold) return 'low';
    return 'ok';
  }

  /**
   * 各憑證狀態（唯讀介面，不含 secret）
   */
  snapshotStatus(): CredentialStatus[] {
    return this.loadPool().map((record) => {
      const remaining = Math.max(0, this.thresholds.dailyLimit - record.quotaUsed);
      return {
        index: record.index,
        identifier: record.identifier,
        quotaUsed: record.quotaUsed,
        remaining,
        isActive: record.isActive,
        isCurrent: record.index === this.activeIndex,
        lastUsed: record.lastUsed,
        lastError: record.lastError,
        errorCount: record.errorCount,
        health: this.healthOf(record, remaining),
      };
    });
  }

  /**
   * Pool 整體摘要
   */
  summarize(): PoolSummary {
    const pool = this.loadPool();
    const totalUsed = pool.reduce((sum, record) => sum + record.quotaUsed, 0);
    const totalCapacity = pool.length * this.thresholds.dailyLimit;

    return {
      credentialCount: pool.length,
      usableCount: pool.filter((record) =>
        isSelectable(record, this.thresholds.emergencyThreshold)
      ).length,
      activeIndex: this.activeIndex,
      totalUsed,
      totalCapacity,
      usagePercent:
        totalCapacity === 0 ? 0 : Math.round((totalUsed / totalCapacity) * 1000) / 10,
    };
  }
}
