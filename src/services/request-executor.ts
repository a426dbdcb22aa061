/**
 * Request Executor
 * Bounded retry loop that migrates across credentials mid-retry
 */

import { randomUUID } from 'node:crypto';
import type { FailureOutcome, PooledCredential } from '../types/credential.js';
import { NonRetryableError, PoolExhaustedError } from '../types/errors.js';
import type { KeyPoolManager } from './key-pool.js';
import { loggers } from '../lib/logger.js';
import { recordExecution, recordPoolExhausted } from '../lib/metrics.js';

const logger = loggers.executor;

export interface ExecutorConfig {
  /** Callback called before each retry, after the pool has handled the failure */
  onRetry?: (error: unknown, attempt: number, outcome: FailureOutcome) => void;
}

/** One unit of remote work bound to a credential */
export type RemoteCall<T> = (credential: PooledCredential) => Promise<T>;

export class RequestExecutor {
  constructor(
    private pool: KeyPoolManager,
    private config: ExecutorConfig = {}
  ) {}

  /**
   * Maximum attempts per call: one per credential plus one
   */
  maxAttempts(): number {
    return this.pool.size() + 1;
  }

  /**
   * Run a remote call with rotation and retry handled
   * @param call The remote call; receives the credential to use
   * @param cost Quota units charged on success only
   * @throws NoCredentialConfiguredError if the pool is empty
   * @throws NonRetryableError if the failure is not credential-related
   * @throws PoolExhaustedError if no usable credential remains or attempts run out;
   *   when no credential is usable up front, `call` is never invoked and `attempts` is 0
   */
  async execute<T>(call: RemoteCall<T>, cost: number): Promise<T> {
    // Passed in every context: the logger's request id stack is shared across executions
    const requestId = randomUUID();
    logger.debug('execute 開始', { requestId, cost });
    try {
      return await this.run(call, cost, requestId);
    } finally {
      logger.debug('execute 結束', { requestId });
    }
  }

  private async run<T>(call: RemoteCall<T>, cost: number, requestId: string): Promise<T> {
    if (!Number.isInteger(cost) || cost < 0) {
      throw new RangeError(`配額單位必須是非負整數: ${cost}`);
    }

    const maxAttempts = this.maxAttempts();
    let lastError: unknown;
    let attempt = 0;

    while (attempt < maxAttempts) {
      // Never send a disabled or over-emergency credential, even if it is still the active one
      const record = this.pool.acquireCredential();
      if (!record) {
        break;
      }
      attempt++;

      const credential: PooledCredential = {
        index: record.index,
        identifier: record.identifier,
        secret: this.pool.secretOf(record.index),
      };

      let result: T;
      try {
        result = await call(credential);
      } catch (error) {
        lastError = error;
        const outcome = this.pool.recordFailure(error, credential.index);

        logger.warn('遠端呼叫失敗', {
          requestId,
          attempt,
          credentialIndex: credential.index,
          identifier: credential.identifier,
          kind: outcome.kind,
          action: outcome.action,
        });

        if (outcome.action === 'abort') {
          recordExecution('non_retryable', attempt);
          throw new NonRetryableError(
            error instanceof Error ? error.message : String(error),
            error
          );
        }

        if (outcome.action === 'exhausted') {
          break;
        }

        if (attempt < maxAttempts && this.config.onRetry) {
          this.config.onRetry(error, attempt, outcome);
        }
        continue;
      }

      this.pool.chargeUsage(cost, credential.index);
      recordExecution('success', attempt);
      return result;
    }

    recordPoolExhausted();
    recordExecution('exhausted', attempt);
    logger.error(
      '所有 API Key 均不可用',
      lastError instanceof Error ? lastError : null,
      { requestId, attempt }
    );
    throw new PoolExhaustedError(`${attempt} 次嘗試後仍無可用的 API Key`, lastError, attempt);
  }
}
