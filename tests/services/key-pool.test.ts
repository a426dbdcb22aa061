/**
 * KeyPoolManager Tests
 * 扣額、預先輪替、失敗分類與每日重置
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { KeyPoolManager, toIdentifier } from '../../src/services/key-pool.js';
import { InMemoryCredentialStore } from '../../src/services/credential-store.js';
import {
  ConfigError,
  CredentialInvalidError,
  NoCredentialConfiguredError,
  QuotaExceededError,
  TransientCredentialError,
  UnknownCredentialError,
} from '../../src/types/errors.js';
import { THRESHOLDS, createTestPool, makeRecord } from '../helpers/pool.js';

const NOW = Date.UTC(2026, 2, 10, 12, 0);
const NEXT_DAY = Date.UTC(2026, 2, 11, 0, 5);

describe('KeyPoolManager', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('toIdentifier', () => {
    it('should keep the last 6 characters', () => {
      expect(toIdentifier('test-secret-0')).toBe('cret-0');
    });

    it('should mask short secrets completely', () => {
      expect(toIdentifier('abcdef')).toBe('***');
    });
  });

  describe('constructor', () => {
    it('should create a fresh record per credential', () => {
      const { store } = createTestPool({ keyCount: 3 });

      expect(store.listAll()).toEqual([
        makeRecord({ index: 0, lastReset: NOW }),
        makeRecord({ index: 1, lastReset: NOW }),
        makeRecord({ index: 2, lastReset: NOW }),
      ]);
    });

    it('should keep existing records from the same day', () => {
      const { store } = createTestPool({
        keyCount: 2,
        initial: [makeRecord({ index: 0, quotaUsed: 500, lastReset: NOW - 60_000 })],
      });

      expect(store.get(0)?.quotaUsed).toBe(500);
      expect(store.get(1)?.quotaUsed).toBe(0);
    });

    it('should reset stale records on startup', () => {
      const yesterday = Date.UTC(2026, 2, 9, 20, 0);
      const { store } = createTestPool({
        keyCount: 1,
        initial: [makeRecord({ index: 0, quotaUsed: 9000, errorCount: 2, lastReset: yesterday })],
      });

      expect(store.get(0)).toMatchObject({ quotaUsed: 0, errorCount: 0, lastReset: NOW });
    });

    it('should reject invalid thresholds', () => {
      expect(
        () =>
          new KeyPoolManager(['test-secret-0'], new InMemoryCredentialStore(), {
            ...THRESHOLDS,
            warnThreshold: 9600,
          })
      ).toThrow(ConfigError);
    });
  });

  describe('currentCredential', () => {
    it('should return the active record', () => {
      const { pool } = createTestPool();

      expect(pool.currentCredential()).toMatchObject({ index: 0, identifier: 'cret-0' });
    });

    it('should throw NoCredentialConfiguredError for an empty pool', () => {
      const { pool } = createTestPool({ keyCount: 0 });

      expect(() => pool.currentCredential()).toThrow(NoCredentialConfiguredError);
    });

    it('should apply the daily reset lazily', () => {
      const { pool } = createTestPool({ keyCount: 1 });
      pool.chargeUsage(5000);

      vi.setSystemTime(NEXT_DAY);
      expect(pool.currentCredential()).toMatchObject({ quotaUsed: 0, lastReset: NEXT_DAY });
    });
  });

  describe('acquireCredential', () => {
    it('should return the active record while it is selectable', () => {
      const { pool } = createTestPool();
      pool.chargeUsage(9000, 1);

      expect(pool.acquireCredential()).toMatchObject({ index: 0, quotaUsed: 0 });
      expect(pool.getActiveIndex()).toBe(0);
    });

    it('should move off an active record that is disabled', () => {
      const { pool } = createTestPool({
        keyCount: 2,
        initial: [makeRecord({ index: 0, isActive: false, lastReset: NOW })],
      });

      expect(pool.getActiveIndex()).toBe(0);
      expect(pool.acquireCredential()).toMatchObject({ index: 1, isActive: true });
      expect(pool.getActiveIndex()).toBe(1);
    });

    it('should move off an active record past the emergency threshold', () => {
      const { pool } = createTestPool({
        keyCount: 2,
        initial: [makeRecord({ index: 0, quotaUsed: 9600, lastReset: NOW })],
      });

      expect(pool.acquireCredential()?.index).toBe(1);
    });

    it('should return null and keep the pointer when nothing is selectable', () => {
      const { pool } = createTestPool({ keyCount: 1 });
      pool.recordFailure(new CredentialInvalidError());

      expect(pool.acquireCredential()).toBeNull();
      expect(pool.getActiveIndex()).toBe(0);
    });

    it('should keep an invalid credential excluded after a new day', () => {
      const { pool, store } = createTestPool({ keyCount: 2 });
      pool.recordFailure(new QuotaExceededError(), 1);
      expect(pool.recordFailure(new CredentialInvalidError())).toEqual({
        kind: 'invalidCredential',
        action: 'exhausted',
      });
      expect(pool.getActiveIndex()).toBe(0);
      expect(pool.acquireCredential()).toBeNull();

      vi.setSystemTime(NEXT_DAY);
      expect(pool.acquireCredential()).toMatchObject({ index: 1, quotaUsed: 0 });
      expect(store.get(0)).toMatchObject({ isActive: false, quotaUsed: 0 });
    });
  });

  describe('secretOf', () => {
    it('should return the configured secret', () => {
      const { pool } = createTestPool();

      expect(pool.secretOf(2)).toBe('test-secret-2');
    });

    it('should throw for unknown index', () => {
      const { pool } = createTestPool();

      expect(() => pool.secretOf(3)).toThrow(UnknownCredentialError);
    });
  });

  describe('chargeUsage', () => {
    it('should not rotate while below the warn threshold', () => {
      const { pool, store } = createTestPool();
      for (let i = 0; i < 7; i++) {
        pool.chargeUsage(1000);
      }
      pool.chargeUsage(999);

      expect(store.get(0)?.quotaUsed).toBe(7999);
      expect(pool.getActiveIndex()).toBe(0);
    });

    it('should rotate preemptively when crossing the warn threshold', () => {
      const { pool, store } = createTestPool();
      pool.chargeUsage(8000);

      expect(store.get(0)?.quotaUsed).toBe(8000);
      expect(pool.currentCredential().index).toBe(1);
    });

    it('should set lastUsed and clear errorCount', () => {
      const { pool, store } = createTestPool();
      pool.recordFailure(new TransientCredentialError('timeout'));
      expect(store.get(0)?.errorCount).toBe(1);

      pool.chargeUsage(1);
      expect(store.get(0)).toMatchObject({ quotaUsed: 1, errorCount: 0, lastUsed: NOW });
    });

    it('should charge the given index without rotating when it is no longer active', () => {
      const { pool, store } = createTestPool();
      pool.rotate();
      expect(pool.getActiveIndex()).toBe(1);

      pool.chargeUsage(9000, 0);
      expect(store.get(0)?.quotaUsed).toBe(9000);
      expect(pool.getActiveIndex()).toBe(1);
    });

    it('should reject invalid units', () => {
      const { pool } = createTestPool();

      expect(() => pool.chargeUsage(-1)).toThrow(RangeError);
      expect(() => pool.chargeUsage(1.5)).toThrow(RangeError);
    });

    it('should accept zero units', () => {
      const { pool, store } = createTestPool();
      pool.chargeUsage(0);

      expect(store.get(0)).toMatchObject({ quotaUsed: 0, lastUsed: NOW });
    });
  });

  describe('rotate', () => {
    it('should move to the next selectable credential', () => {
      const { pool } = createTestPool();

      expect(pool.rotate()).toBe(true);
      expect(pool.getActiveIndex()).toBe(1);
    });

    it('should only reach emergency credentials when forced', () => {
      const { pool } = createTestPool({ keyCount: 2 });

      pool.chargeUsage(8000);
      expect(pool.getActiveIndex()).toBe(1);

      // Key 1 超過 emergency，自動輪替回到仍低於 emergency 的 Key 0
      pool.chargeUsage(9600);
      expect(pool.getActiveIndex()).toBe(0);

      // 一般輪替略過 Key 1，最後檢查自己
      expect(pool.rotate(false)).toBe(true);
      expect(pool.getActiveIndex()).toBe(0);

      expect(pool.rotate(true)).toBe(true);
      expect(pool.getActiveIndex()).toBe(1);
    });

    it('should return false and keep state when every credential is inactive', () => {
      const { pool } = createTestPool();
      pool.rotate();
      pool.disable(0);
      pool.disable(1);
      pool.disable(2);

      // 停用 Key 1 時換到 Key 2；停用 Key 2 時已無處可去
      expect(pool.getActiveIndex()).toBe(2);
      expect(pool.rotate(false)).toBe(false);
      expect(pool.rotate(true)).toBe(false);
      expect(pool.getActiveIndex()).toBe(2);
    });

    it('should return false for an empty pool', () => {
      const { pool } = createTestPool({ keyCount: 0 });

      expect(pool.rotate()).toBe(false);
    });

    it('should see credentials reset by a new day', () => {
      const { pool } = createTestPool({ keyCount: 2 });
      pool.recordFailure(new QuotaExceededError());
      pool.recordFailure(new QuotaExceededError());
      expect(pool.rotate()).toBe(false);

      vi.setSystemTime(NEXT_DAY);
      expect(pool.rotate()).toBe(true);
    });
  });

  describe('recordFailure', () => {
    it('should pin quota to the daily limit and rotate on quota exceeded', () => {
      const { pool, store } = createTestPool();

      const outcome = pool.recordFailure(new QuotaExceededError());

      expect(outcome).toEqual({ kind: 'quotaExceeded', action: 'rotated' });
      expect(store.get(0)).toMatchObject({ quotaUsed: 10000, errorCount: 1, lastError: NOW });
      expect(pool.getActiveIndex()).toBe(1);
    });

    it('should make a quota-exceeded credential usable again the next UTC day', () => {
      const { pool } = createTestPool();
      pool.recordFailure(new QuotaExceededError());

      vi.setSystemTime(NEXT_DAY);
      const [first] = pool.snapshotStatus();
      expect(first).toMatchObject({ index: 0, quotaUsed: 0, errorCount: 0, health: 'ok' });
    });

    it('should disable an invalid credential and keep it disabled across resets', () => {
      const { pool, store } = createTestPool();
      pool.chargeUsage(100);

      const outcome = pool.recordFailure(new CredentialInvalidError());

      expect(outcome).toEqual({ kind: 'invalidCredential', action: 'rotated' });
      expect(store.get(0)).toMatchObject({ quotaUsed: 100, errorCount: 1, isActive: false });
      expect(pool.getActiveIndex()).toBe(1);

      vi.setSystemTime(NEXT_DAY);
      pool.currentCredential();
      pool.rotate();
      expect(store.get(0)).toMatchObject({
        quotaUsed: 0,
        errorCount: 0,
        isActive: false,
        lastReset: NEXT_DAY,
      });
      expect(pool.getActiveIndex()).toBe(2);
    });

    it('should retry transient failures until three consecutive errors', () => {
      const { pool, store } = createTestPool();
      const error = new TransientCredentialError('rate limited', 429);

      expect(pool.recordFailure(error)).toEqual({ kind: 'transient', action: 'retry' });
      expect(pool.recordFailure(error)).toEqual({ kind: 'transient', action: 'retry' });
      expect(pool.getActiveIndex()).toBe(0);

      expect(pool.recordFailure(error)).toEqual({ kind: 'transient', action: 'rotated' });
      expect(store.get(0)?.errorCount).toBe(3);
      expect(pool.getActiveIndex()).toBe(1);
    });

    it('should abort non-retryable errors without touching the record', () => {
      const { pool, store } = createTestPool();
      const before = store.get(0);

      expect(pool.recordFailure(new Error('bad request'))).toEqual({
        kind: 'nonRetryable',
        action: 'abort',
      });
      expect(store.get(0)).toEqual(before);
    });

    it('should report exhausted when no other credential is selectable', () => {
      const { pool } = createTestPool({ keyCount: 1 });

      expect(pool.recordFailure(new QuotaExceededError())).toEqual({
        kind: 'quotaExceeded',
        action: 'exhausted',
      });
      expect(pool.getActiveIndex()).toBe(0);
    });

    it('should not rotate again when the failed credential is no longer active', () => {
      const { pool } = createTestPool();
      pool.rotate();

      expect(pool.recordFailure(new QuotaExceededError(), 0)).toEqual({
        kind: 'quotaExceeded',
        action: 'rotated',
      });
      expect(pool.getActiveIndex()).toBe(1);
    });

    it('should use an injected classifier', () => {
      const { pool } = createTestPool({ classifier: () => 'quotaExceeded' });

      expect(pool.recordFailure('anything').kind).toBe('quotaExceeded');
    });
  });

  describe('enable / disable', () => {
    it('should toggle isActive and clear errors on enable', () => {
      const { pool, store } = createTestPool();
      pool.recordFailure(new TransientCredentialError('timeout'));

      expect(pool.disable(0).isActive).toBe(false);
      const enabled = pool.enable(0);
      expect(enabled).toMatchObject({ index: 0, isActive: true, errorCount: 0 });
      expect(store.get(0)?.isActive).toBe(true);
    });

    it('should rotate away when disabling the active credential', () => {
      const { pool } = createTestPool();

      pool.disable(0);
      expect(pool.getActiveIndex()).toBe(1);
      expect(pool.currentCredential().isActive).toBe(true);
    });

    it('should keep the pointer when disabling another credential', () => {
      const { pool } = createTestPool();

      pool.disable(2);
      expect(pool.getActiveIndex()).toBe(0);
    });

    it('should throw for unknown index', () => {
      const { pool } = createTestPool();

      expect(() => pool.enable(9)).toThrow('找不到 index 為 9 的 API Key');
      expect(() => pool.disable(-1)).toThrow(UnknownCredentialError);
    });
  });

  describe('resetAll', () => {
    it('should reset quota and errors but keep isActive', () => {
      const { pool, store } = createTestPool({ keyCount: 2 });
      pool.chargeUsage(3000);
      pool.disable(1);

      vi.setSystemTime(NOW + 60_000);
      pool.resetAll();

      expect(store.get(0)).toMatchObject({ quotaUsed: 0, errorCount: 0, lastReset: NOW + 60_000 });
      expect(store.get(1)?.isActive).toBe(false);
    });
  });

  describe('snapshotStatus / summarize', () => {
    function mixedPool() {
      return createTestPool({
        keyCount: 4,
        initial: [
          makeRecord({ index: 0, quotaUsed: 200, lastReset: NOW }),
          makeRecord({ index: 1, quotaUsed: 9600, lastReset: NOW }),
          makeRecord({ index: 2, quotaUsed: 10000, lastReset: NOW }),
          makeRecord({ index: 3, isActive: false, lastReset: NOW }),
        ],
      });
    }

    it('should report remaining quota and health per credential', () => {
      const { pool } = mixedPool();

      expect(
        pool.snapshotStatus().map((s) => [s.index, s.remaining, s.health, s.isCurrent])
      ).toEqual([
        [0, 9800, 'ok', true],
        [1, 400, 'low', false],
        [2, 0, 'exhausted', false],
        [3, 10000, 'disabled', false],
      ]);
    });

    it('should never expose secrets', () => {
      const { pool } = mixedPool();

      expect(JSON.stringify(pool.snapshotStatus())).not.toContain('test-secret');
    });

    it('should honour a custom low remaining threshold', () => {
      const { pool } = createTestPool({
        keyCount: 1,
        initial: [makeRecord({ index: 0, quotaUsed: 8500, lastReset: NOW })],
        options: { lowRemainingThreshold: 2000 },
      });

      expect(pool.snapshotStatus()[0].health).toBe('low');
    });

    it('should summarize totals', () => {
      const { pool } = mixedPool();

      expect(pool.summarize()).toEqual({
        credentialCount: 4,
        usableCount: 1,
        activeIndex: 0,
        totalUsed: 19800,
        totalCapacity: 40000,
        usagePercent: 49.5,
      });
    });

    it('should summarize an empty pool', () => {
      const { pool } = createTestPool({ keyCount: 0 });

      expect(pool.summarize()).toMatchObject({ credentialCount: 0, usagePercent: 0 });
    });
  });
});
