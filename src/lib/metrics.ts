/**
 * Prometheus 指標收集
 * 追蹤配額扣除、憑證失敗、輪替與 executor 嘗試次數
 */

import { register, Counter, Gauge, Histogram } from 'prom-client';
import type { CredentialStatus, FailureKind } from '../types/credential.js';

/**
 * 配額指標
 */
export const quotaUnitsChargedTotal = new Counter({
  name: 'quota_units_charged_total',
  help: '已扣除的配額單位總數',
  labelNames: ['credential'],
});

export const credentialQuotaUsed = new Gauge({
  name: 'credential_quota_used',
  help: '各憑證目前已使用配額',
  labelNames: ['credential'],
});

export const credentialActive = new Gauge({
  name: 'credential_active',
  help: '憑證是否啟用 (1=啟用, 0=停用)',
  labelNames: ['credential'],
});

/**
 * 失敗與輪替指標
 */
export const credentialFailuresTotal = new Counter({
  name: 'credential_failures_total',
  help: '憑證呼叫失敗次數',
  labelNames: ['credential', 'kind'],
});

export const credentialRotationsTotal = new Counter({
  name: 'credential_rotations_total',
  help: '憑證輪替次數',
  labelNames: ['reason', 'result'], // result: 'rotated' | 'exhausted'
});

export const poolExhaustedTotal = new Counter({
  name: 'pool_exhausted_total',
  help: '找不到可用憑證而終止的呼叫次數',
});

/**
 * Executor 指標
 */
export const executorAttempts = new Histogram({
  name: 'executor_attempts',
  help: '每次 execute 使用的嘗試次數',
  labelNames: ['outcome'], // 'success' | 'exhausted' | 'non_retryable'
  buckets: [1, 2, 3, 5, 8, 13],
});

export type RotationReason =
  | 'preemptive'
  | 'quota_exceeded'
  | 'invalid_credential'
  | 'errors'
  | 'manual'
  | 'unusable';

function credentialLabel(index: number): string {
  return String(index);
}

export function recordCharge(index: number, units: number, quotaUsed: number): void {
  quotaUnitsChargedTotal.inc({ credential: credentialLabel(index) }, units);
  credentialQuotaUsed.set({ credential: credentialLabel(index) }, quotaUsed);
}

export function recordFailureKind(index: number, kind: FailureKind): void {
  credentialFailuresTotal.inc({ credential: credentialLabel(index), kind });
}

export function recordRotation(reason: RotationReason, rotated: boolean): void {
  credentialRotationsTotal.inc({ reason, result: rotated ? 'rotated' : 'exhausted' });
}

export function recordPoolExhausted(): void {
  poolExhaustedTotal.inc();
}

export function recordExecution(
  outcome: 'success' | 'exhausted' | 'non_retryable',
  attempts: number
): void {
  executorAttempts.observe({ outcome }, attempts);
}

/**
 * 以狀態快照同步各憑證 gauge
 */
export function updateCredentialGauges(statuses: CredentialStatus[]): void {
  for (const status of statuses) {
    credentialQuotaUsed.set({ credential: credentialLabel(status.index) }, status.quotaUsed);
    credentialActive.set({ credential: credentialLabel(status.index) }, status.isActive ? 1 : 0);
  }
}

/**
 * 收集所有指標的 Prometheus 格式
 */
export async function getMetricsSnapshot(): Promise<string> {
  return register.metrics();
}

export function getMetricsContentType(): string {
  return register.contentType;
}

/**
 * 重置所有指標（用於測試）
 */
export function resetMetrics(): void {
  register.resetMetrics();
}
