/**
 * Health Check Command
 * 健康檢查指令 - 檢查 API Key pool 與配額紀錄狀態
 */

import { Command } from 'commander';
import { HealthCheckService, getExitCode, type HealthStatus } from '../services/health.js';
import { getPoolContext } from '../lib/pool-factory.js';
import { reportError } from '../utils/output.js';

export const healthCommand = new Command('health')
  .description('檢查系統健康狀態')
  .option('--text', '輸出可讀文字格式')
  .action((options: { text?: boolean }) => {
    try {
      const { pool, store } = getPoolContext();
      const result = new HealthCheckService(pool, store).check();

      if (options.text) {
        console.log(`狀態: ${formatStatusWithEmoji(result.status)}`);
        console.log(`時間: ${result.timestamp}`);
        console.log('組件狀態:');
        console.log(`  ${getEmoji(result.components.credentials.status)} API Key: ${result.components.credentials.details}`);
        console.log(`  ${getEmoji(result.components.store.status)} 配額紀錄: ${result.components.store.details}`);
        console.log(`摘要: ${result.summary}`);
      } else {
        console.log(JSON.stringify(result, null, 2));
      }

      process.exitCode = getExitCode(result.status);
    } catch (error) {
      reportError('健康檢查失敗', error);
    }
  });

function formatStatusWithEmoji(status: HealthStatus): string {
  switch (status) {
    case 'healthy':
      return '✅ 健康 (Healthy)';
    case 'degraded':
      return '⚠️ 降級 (Degraded)';
    case 'unhealthy':
      return '❌ 不健康 (Unhealthy)';
  }
}

function getEmoji(status: HealthStatus): string {
  switch (status) {
    case 'healthy':
      return '✅';
    case 'degraded':
      return '⚠️';
    case 'unhealthy':
      return '❌';
  }
}
