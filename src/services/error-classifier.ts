/**
 * Error Classifier
 * 傳輸層錯誤 → pool 能理解的失敗分類
 * 分類只依型別與結構化欄位，不比對訊息文字
 */

import { FetchError } from 'ofetch';
import type { FailureKind } from '../types/credential.js';
import {
  CredentialInvalidError,
  QuotaExceededError,
  TransientCredentialError,
} from '../types/errors.js';

export type ErrorClassifier = (error: unknown) => FailureKind;

/**
 * 預設分類器：只認得已分類的錯誤型別
 */
export const defaultClassifier: ErrorClassifier = (error) => {
  if (error instanceof QuotaExceededError) return 'quotaExceeded';
  if (error instanceof CredentialInvalidError) return 'invalidCredential';
  if (error instanceof TransientCredentialError) return 'transient';
  return 'nonRetryable';
};

export interface HttpClassifierOptions {
  /** 視為配額用盡的 reason */
  quotaReasons?: string[];
  /** 視為憑證無效的 reason */
  invalidKeyReasons?: string[];
  /** 視為暫時性、與憑證相關的 HTTP 狀態碼 */
  transientStatuses?: number[];
}

const DEFAULT_HTTP_OPTIONS: Required<HttpClassifierOptions> = {
  quotaReasons: ['quotaExceeded', 'dailyLimitExceeded'],
  invalidKeyReasons: ['keyInvalid', 'API_KEY_INVALID'],
  transientStatuses: [401, 403, 429, 500, 502, 503, 504],
};

function asRecord(value: unknown): Record<string, unknown> | null {
  return typeof value === 'object' && value !== null ? { ...value } : null;
}

/**
 * 從錯誤回應主體取出所有 reason
 * 支援 { error: { errors: [{ reason }], details: [{ reason }] } } 結構
 */
export function extractErrorReasons(body: unknown): string[] {
  const root = asRecord(body);
  const inner = asRecord(root?.error);
  if (!inner) {
    return [];
  }

  const reasons: string[] = [];
  for (const listKey of ['errors', 'details']) {
    const list = inner[listKey];
    if (!Array.isArray(list)) continue;

    for (const item of list) {
      const reason = asRecord(item)?.reason;
      if (typeof reason === 'string') {
        reasons.push(reason);
      }
    }
  }
  return reasons;
}

/**
 * 建立 HTTP（ofetch FetchError）分類器
 * 沒有回應的錯誤（網路、逾時）與其他狀態碼視為 nonRetryable
 */
export function createHttpErrorClassifier(
  options: HttpClassifierOptions = {}
): ErrorClassifier {
  const config = { ...DEFAULT_HTTP_OPTIONS, ...options };

  return (error) => {
    const typed = defaultClassifier(error);
    if (typed !== 'nonRetryable') {
      return typed;
    }

    if (!(error instanceof FetchError)) {
      return 'nonRetryable';
    }

    const status = error.statusCode;
    if (status === undefined) {
      return 'nonRetryable';
    }

    const reasons = extractErrorReasons(error.data);
    if (status === 403 && reasons.some((r) => config.quotaReasons.includes(r))) {
      return 'quotaExceeded';
    }
    if (status === 400 && reasons.some((r) => config.invalidKeyReasons.includes(r))) {
      return 'invalidCredential';
    }
    if (config.transientStatuses.includes(status)) {
      return 'transient';
    }
    return 'nonRetryable';
  };
}
