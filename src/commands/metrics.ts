/**
 * Metrics Command
 * 以 Prometheus 格式暴露配額指標
 */

import { Command } from 'commander';
import { getPoolContext } from '../lib/pool-factory.js';
import { getMetricsSnapshot, updateCredentialGauges } from '../lib/metrics.js';
import { reportError } from '../utils/output.js';

export const metricsCommand = new Command('metrics')
  .description('以 Prometheus 格式輸出指標')
  .action(async () => {
    try {
      const { pool } = getPoolContext();
      updateCredentialGauges(pool.snapshotStatus());
      console.log(await getMetricsSnapshot());
    } catch (error) {
      reportError('指標匯出失敗', error);
    }
  });
