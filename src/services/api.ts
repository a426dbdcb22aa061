/**
 * Pooled API Client
 * 以 ofetch 發送請求，API Key 由 pool 決定，輪替與重試交給 RequestExecutor
 */

import { ofetch } from 'ofetch';
import type { KeyPoolManager } from './key-pool.js';
import { RequestExecutor, type ExecutorConfig } from './request-executor.js';
import { loggers } from '../lib/logger.js';

export type QueryValue = string | number | boolean;

export interface PooledApiClientOptions {
  /** API 根路徑 */
  baseURL: string;
  /** 放 API Key 的 query 參數名（預設 key） */
  keyParam?: string;
  /** 單次請求逾時（預設 10000ms） */
  timeoutMs?: number;
  /** executor 設定 */
  executor?: ExecutorConfig;
}

export interface RequestOptions {
  query?: Record<string, QueryValue>;
  /** 成功時扣除的配額單位（預設 1） */
  cost?: number;
}

export class PooledApiClient {
  private executor: RequestExecutor;
  private baseURL: string;
  private keyParam: string;
  private timeoutMs: number;

  constructor(pool: KeyPoolManager, options: PooledApiClientOptions) {
    this.executor = new RequestExecutor(pool, options.executor);
    this.baseURL = options.baseURL;
    this.keyParam = options.keyParam ?? 'key';
    this.timeoutMs = options.timeoutMs ?? 10000;
  }

  /**
   * 發送 GET 請求
   * @throws PoolExhaustedError / NonRetryableError / NoCredentialConfiguredError
   */
  async get<T>(path: string, options: RequestOptions = {}): Promise<T> {
    const { query = {}, cost = 1 } = options;

    return loggers.api.trackAsync(
      `GET ${path}`,
      () =>
        this.executor.execute(
          (credential) =>
            ofetch<T>(path, {
              baseURL: this.baseURL,
              method: 'GET',
              query: { ...query, [this.keyParam]: credential.secret },
              timeout: this.timeoutMs,
              retry: 0,
            }),
          cost
        ),
      { path, cost }
    );
  }
}
