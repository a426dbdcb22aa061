import { Command } from 'commander';
import { quotaCommand } from './commands/quota.js';
import { healthCommand } from './commands/health.js';
import { metricsCommand } from './commands/metrics.js';
import { fetchCommand } from './commands/fetch.js';
import { setLogLevel } from './lib/logger.js';

export const cli = new Command();

export const KEY_INDEX_HELP = `
API Key index:
  QUOTA_POOL_KEYS（或設定檔 keys）中的空白項會被略過，不佔 index。
  index 依非空白 Key 的順序從 0 起算，例如 "k1,,k2" 中 k2 是 Key 1。
  配額紀錄以 index 對應 Key，增刪或調整 Key 順序後請以 quota status 確認。`;

cli
  .name('qpool')
  .description('API Key pool with shared daily quota, rotation and retry')
  .version('0.1.0');

// 全域選項
cli
  .option('-f, --format <format>', '輸出格式: json | table（未指定時用設定檔 format，再預設 json）')
  .option('-q, --quiet', '安靜模式')
  .option('-v, --verbose', '詳細模式')
  .addHelpText('after', KEY_INDEX_HELP);

// 預設只輸出警告以上的日誌，避免混入指令輸出
cli.hook('preAction', (thisCommand) => {
  const { quiet, verbose } = thisCommand.opts<{ quiet?: boolean; verbose?: boolean }>();
  setLogLevel(quiet ? 'silent' : verbose ? 'debug' : 'warn');
});

// 註冊指令
cli.addCommand(quotaCommand);
cli.addCommand(healthCommand);
cli.addCommand(metricsCommand);
cli.addCommand(fetchCommand);
