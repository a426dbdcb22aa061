/**
 * Health Check Service - Pool 健康狀態檢查
 * 檢查憑證可用性與配額紀錄儲存層
 */

import type { KeyPoolManager } from './key-pool.js';
import type { CredentialStore } from './credential-store.js';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface ComponentHealth {
  status: HealthStatus;
  details: string;
  lastChecked: string;
}

export interface HealthCheckResult {
  status: HealthStatus;
  timestamp: string;
  components: {
    credentials: ComponentHealth;
    store: ComponentHealth;
  };
  summary: string;
}

export class HealthCheckService {
  constructor(
    private pool: KeyPoolManager,
    private store: CredentialStore
  ) {}

  /**
   * 執行完整的健康檢查
   */
  check(): HealthCheckResult {
    const timestamp = new Date().toISOString();

    const storeHealth = this.checkStoreHealth();
    // 儲存層不可讀時，憑證狀態也無從判斷
    const credentialHealth =
      storeHealth.status === 'unhealthy'
        ? { status: 'unhealthy' as const, details: '無法讀取配額紀錄', lastChecked: timestamp }
        : this.checkCredentialHealth();

    const status = this.determineOverallStatus([credentialHealth.status, storeHealth.status]);

    return {
      status,
      timestamp,
      components: {
        credentials: credentialHealth,
        store: storeHealth,
      },
      summary: this.generateSummary(status, credentialHealth),
    };
  }

  /**
   * 檢查憑證狀態
   * - 沒有可選取的憑證 → unhealthy
   * - 有停用 / 低配額 / 用盡，或使用中者已達 warn → degraded
   */
  private checkCredentialHealth(): ComponentHealth {
    const lastChecked = new Date().toISOString();
    const summary = this.pool.summarize();
    const statuses = this.pool.snapshotStatus();

    if (summary.usableCount === 0) {
      return {
        status: 'unhealthy',
        details: `沒有可用的 API Key (共 ${summary.credentialCount} 組)`,
        lastChecked,
      };
    }

    const { warnThreshold } = this.pool.getThresholds();
    const current = statuses.find((s) => s.isCurrent);
    const troubled = statuses.filter((s) => s.health !== 'ok');

    if (troubled.length > 0 || (current !== undefined && current.quotaUsed >= warnThreshold)) {
      return {
        status: 'degraded',
        details: `可用 ${summary.usableCount}/${summary.credentialCount} 組，異常 ${troubled.length} 組，配額使用 ${summary.usagePercent}%`,
        lastChecked,
      };
    }

    return {
      status: 'healthy',
      details: `可用 ${summary.usableCount}/${summary.credentialCount} 組，配額使用 ${summary.usagePercent}%`,
      lastChecked,
    };
  }

  /**
   * 檢查儲存層是否可讀
   */
  private checkStoreHealth(): ComponentHealth {
    const lastChecked = new Date().toISOString();
    try {
      const count = this.store.listAll().length;
      return {
        status: 'healthy',
        details: `配額紀錄 ${count} 筆`,
        lastChecked,
      };
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      return {
        status: 'unhealthy',
        details: `配額紀錄讀取失敗: ${errorMsg}`,
        lastChecked,
      };
    }
  }

  private determineOverallStatus(statuses: HealthStatus[]): HealthStatus {
    if (statuses.includes('unhealthy')) return 'unhealthy';
    if (statuses.includes('degraded')) return 'degraded';
    return 'healthy';
  }

  private generateSummary(status: HealthStatus, credentials: ComponentHealth): string {
    switch (status) {
      case 'healthy':
        return '所有元件正常運作';
      case 'degraded':
        return `部分 API Key 需要注意：${credentials.details}`;
      case 'unhealthy':
        return `Pool 無法服務：${credentials.details}`;
    }
  }
}

/**
 * 健康狀態對應的 CLI 結束碼
 */
export function getExitCode(status: HealthStatus): number {
  return status === 'unhealthy' ? 2 : 0;
}
