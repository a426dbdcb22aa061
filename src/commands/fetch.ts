/**
 * Fetch Command
 * 透過 API Key pool 發送一次 GET 請求（自動輪替與重試）
 */

import { Command } from 'commander';
import { PooledApiClient, type QueryValue } from '../services/api.js';
import { getPoolContext } from '../lib/pool-factory.js';
import { reportError } from '../utils/output.js';

interface FetchOptions {
  baseUrl: string;
  cost: string;
  keyParam: string;
  query: string[];
  timeout: string;
}

/**
 * 解析 name=value 形式的查詢參數
 */
export function parseQueryPairs(pairs: string[]): Record<string, QueryValue> {
  const query: Record<string, QueryValue> = {};
  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    if (separator <= 0) {
      throw new Error(`查詢參數格式錯誤（需為 name=value）: ${pair}`);
    }
    query[pair.slice(0, separator)] = pair.slice(separator + 1);
  }
  return query;
}

/**
 * 解析整數選項
 * @param min 允許的最小值（cost 為 0，timeout 為 1）
 */
export function parseIntegerOption(name: string, value: string, min: number): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed) || parsed < min) {
    const expected = min > 0 ? '正整數' : '非負整數';
    throw new Error(`${name} 必須是${expected}: ${value}`);
  }
  return parsed;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export const fetchCommand = new Command('fetch')
  .description('透過 API Key pool 發送 GET 請求')
  .argument('<path>', 'API 路徑')
  .requiredOption('--base-url <url>', 'API 根路徑')
  .option('--cost <units>', '成功時扣除的配額單位', '1')
  .option('--key-param <name>', '放 API Key 的 query 參數名', 'key')
  .option('--query <pair>', '查詢參數 name=value（可重複）', collect, [])
  .option('--timeout <ms>', '單次請求逾時（毫秒）', '10000')
  .action(async (path: string, options: FetchOptions) => {
    try {
      const cost = parseIntegerOption('--cost', options.cost, 0);
      // ofetch 把 0 或 NaN 視為不設逾時
      const timeoutMs = parseIntegerOption('--timeout', options.timeout, 1);
      const { pool } = getPoolContext();

      const client = new PooledApiClient(pool, {
        baseURL: options.baseUrl,
        keyParam: options.keyParam,
        timeoutMs,
      });
      const data = await client.get<unknown>(path, {
        query: parseQueryPairs(options.query),
        cost,
      });

      console.log(JSON.stringify(data, null, 2));
    } catch (error) {
      reportError('請求失敗', error);
    }
  });
