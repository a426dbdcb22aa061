/**
 * RotationPolicy Tests
 * 純函數：預警輪替判斷與下一把憑證選取
 */

import { describe, it, expect } from 'vitest';
import {
  isSelectable,
  selectNext,
  shouldRotateAway,
} from '../../src/services/rotation-policy.js';
import type { CredentialRecord } from '../../src/types/credential.js';
import { makeRecord } from '../helpers/pool.js';

const WARN = 8000;
const EMERGENCY = 9500;

function freshPool(size: number): CredentialRecord[] {
  return Array.from({ length: size }, (_, index) => makeRecord({ index }));
}

describe('RotationPolicy', () => {
  describe('shouldRotateAway', () => {
    it('should stay below the warn threshold', () => {
      expect(shouldRotateAway(makeRecord({ index: 0, quotaUsed: 7999 }), WARN)).toBe(false);
    });

    it('should rotate at the warn threshold', () => {
      expect(shouldRotateAway(makeRecord({ index: 0, quotaUsed: 8000 }), WARN)).toBe(true);
    });

    it('should rotate after three consecutive errors', () => {
      expect(shouldRotateAway(makeRecord({ index: 0, errorCount: 2 }), WARN)).toBe(false);
      expect(shouldRotateAway(makeRecord({ index: 0, errorCount: 3 }), WARN)).toBe(true);
    });
  });

  describe('isSelectable', () => {
    it('should reject inactive credentials even when forced', () => {
      const record = makeRecord({ index: 0, isActive: false });

      expect(isSelectable(record, EMERGENCY)).toBe(false);
      expect(isSelectable(record, EMERGENCY, true)).toBe(false);
    });

    it('should reject credentials at the emergency threshold unless forced', () => {
      const record = makeRecord({ index: 0, quotaUsed: 9500 });

      expect(isSelectable(record, EMERGENCY)).toBe(false);
      expect(isSelectable(record, EMERGENCY, true)).toBe(true);
    });
  });

  describe('selectNext', () => {
    it('should pick the next index after the start', () => {
      expect(selectNext(freshPool(3), 0, EMERGENCY)).toBe(1);
    });

    it('should wrap around the end of the pool', () => {
      expect(selectNext(freshPool(3), 2, EMERGENCY)).toBe(0);
    });

    it('should skip inactive credentials', () => {
      const pool = freshPool(3);
      pool[1].isActive = false;

      expect(selectNext(pool, 0, EMERGENCY)).toBe(2);
    });

    it('should skip credentials at or over emergency unless forced', () => {
      const pool = freshPool(3);
      pool[1].quotaUsed = 9500;

      expect(selectNext(pool, 0, EMERGENCY)).toBe(2);
      expect(selectNext(pool, 0, EMERGENCY, true)).toBe(1);
    });

    it('should check the start index last', () => {
      const pool = freshPool(3);
      pool[1].isActive = false;
      pool[2].isActive = false;

      expect(selectNext(pool, 0, EMERGENCY)).toBe(0);
    });

    it('should return the single credential of a pool of one when selectable', () => {
      expect(selectNext(freshPool(1), 0, EMERGENCY)).toBe(0);
    });

    it('should return null when every credential is inactive, even when forced', () => {
      const pool = freshPool(3).map((record) => ({ ...record, isActive: false }));

      expect(selectNext(pool, 1, EMERGENCY)).toBeNull();
      expect(selectNext(pool, 1, EMERGENCY, true)).toBeNull();
    });

    it('should return null for an empty pool', () => {
      expect(selectNext([], 0, EMERGENCY)).toBeNull();
    });

    it('should never select inactive or (unforced) emergency credentials', () => {
      // 每把憑證四種狀態的所有組合
      const variants: Array<Pick<CredentialRecord, 'isActive' | 'quotaUsed'>> = [
        { isActive: true, quotaUsed: 0 },
        { isActive: true, quotaUsed: 9500 },
        { isActive: false, quotaUsed: 0 },
        { isActive: false, quotaUsed: 9500 },
      ];

      for (const a of variants) {
        for (const b of variants) {
          for (const c of variants) {
            const pool = [a, b, c].map((variant, index) => makeRecord({ index, ...variant }));

            for (let start = 0; start < pool.length; start++) {
              for (const force of [false, true]) {
                const selected = selectNext(pool, start, EMERGENCY, force);
                const anySelectable = pool.some((r) => isSelectable(r, EMERGENCY, force));

                if (selected === null) {
                  expect(anySelectable).toBe(false);
                  continue;
                }
                expect(pool[selected].isActive).toBe(true);
                if (!force) {
                  expect(pool[selected].quotaUsed).toBeLessThan(EMERGENCY);
                }
              }
            }
          }
        }
      }
    });
  });
});
