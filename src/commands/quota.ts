/**
 * Quota Command
 * 配額狀態查詢與 API Key 手動管理
 */

import { Command } from 'commander';
import Table from 'cli-table3';
import { getPoolContext } from '../lib/pool-factory.js';
import { timeUntilReset } from '../services/quota-clock.js';
import { getConfigService } from '../services/config.js';
import { outputData, reportError, resolveFormat, type OutputFormat } from '../utils/output.js';
import type { CredentialHealth, CredentialStatus, PoolSummary } from '../types/credential.js';

export const quotaCommand = new Command('quota')
  .description('API Key 配額管理');

const HEALTH_LABEL: Record<CredentialHealth, string> = {
  ok: '🟢 正常',
  low: '🟡 偏低',
  exhausted: '🔴 用盡',
  disabled: '⛔ 停用',
};

function formatTime(epochMs: number | null): string {
  return epochMs === null ? '-' : new Date(epochMs).toISOString().slice(11, 16) + ' UTC';
}

/**
 * 以表格呈現各 API Key 狀態
 */
export function renderStatusTable(statuses: CredentialStatus[], dailyLimit: number): string {
  const table = new Table({
    head: ['#', 'Key', '配額', '剩餘', '狀態', '最後使用', '錯誤'],
    style: { head: ['cyan'] },
  });

  for (const status of statuses) {
    table.push([
      status.isCurrent ? `*${status.index}` : String(status.index),
      `…${status.identifier}`,
      `${status.quotaUsed.toLocaleString('en-US')}/${dailyLimit.toLocaleString('en-US')}`,
      status.remaining.toLocaleString('en-US'),
      HEALTH_LABEL[status.health],
      formatTime(status.lastUsed),
      String(status.errorCount),
    ]);
  }

  return table.toString();
}

export function renderSummary(summary: PoolSummary): string {
  return (
    `總配額: ${summary.totalUsed.toLocaleString('en-US')} / ` +
    `${summary.totalCapacity.toLocaleString('en-US')} (${summary.usagePercent.toFixed(1)}%)\n` +
    `可用: ${summary.usableCount}/${summary.credentialCount}，使用中: Key ${summary.activeIndex}`
  );
}

function parseIndex(value: string): number {
  const index = Number(value);
  if (!Number.isInteger(index) || index < 0) {
    throw new Error(`index 必須是非負整數: ${value}`);
  }
  return index;
}

function formatOf(cmd: Command): OutputFormat {
  return resolveFormat(cmd.optsWithGlobals().format, getConfigService().get('format'));
}

/**
 * quota status
 */
quotaCommand
  .command('status')
  .description('顯示各 API Key 配額狀態')
  .action((options, cmd: Command) => {
    try {
      const format = formatOf(cmd);
      const { pool } = getPoolContext();
      const statuses = pool.snapshotStatus();

      outputData(statuses, format, () =>
        renderStatusTable(statuses, pool.getThresholds().dailyLimit)
      );
    } catch (error) {
      reportError('配額狀態查詢失敗', error);
    }
  });

/**
 * quota summary
 */
quotaCommand
  .command('summary')
  .description('顯示整體配額使用摘要')
  .action((options, cmd: Command) => {
    try {
      const format = formatOf(cmd);
      const { pool } = getPoolContext();
      const summary = pool.summarize();

      outputData(summary, format, () => renderSummary(summary));
    } catch (error) {
      reportError('配額摘要查詢失敗', error);
    }
  });

/**
 * quota enable <index>
 */
quotaCommand
  .command('enable')
  .description('重新啟用已停用的 API Key')
  .argument('<index>', 'API Key index')
  .action((index: string) => {
    try {
      const record = getPoolContext().pool.enable(parseIndex(index));
      console.log(`✅ 已啟用 Key ${record.index} (…${record.identifier})`);
    } catch (error) {
      reportError('啟用失敗', error);
    }
  });

/**
 * quota disable <index>
 */
quotaCommand
  .command('disable')
  .description('停用 API Key')
  .argument('<index>', 'API Key index')
  .action((index: string) => {
    try {
      const record = getPoolContext().pool.disable(parseIndex(index));
      console.log(`⛔ 已停用 Key ${record.index} (…${record.identifier})`);
    } catch (error) {
      reportError('停用失敗', error);
    }
  });

/**
 * quota reset-time
 */
quotaCommand
  .command('reset-time')
  .description('顯示距離下次配額重置（UTC 午夜）的時間')
  .action(() => {
    const { hours, minutes } = timeUntilReset(Date.now());
    console.log(`配額將於 ${hours}h ${minutes}m 後重置（UTC 午夜）`);
  });
