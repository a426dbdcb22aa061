/**
 * quota-pool 公開 API
 */

export { KeyPoolManager, toIdentifier } from './services/key-pool.js';
export { RequestExecutor } from './services/request-executor.js';
export type { ExecutorConfig, RemoteCall } from './services/request-executor.js';
export {
  InMemoryCredentialStore,
  JsonFileCredentialStore,
  DEFAULT_STORE_PATH,
} from './services/credential-store.js';
export type { CredentialStore } from './services/credential-store.js';
export { isResetDue, nextResetAt, timeUntilReset } from './services/quota-clock.js';
export { selectNext, shouldRotateAway, isSelectable } from './services/rotation-policy.js';
export {
  defaultClassifier,
  createHttpErrorClassifier,
  extractErrorReasons,
} from './services/error-classifier.js';
export type { ErrorClassifier, HttpClassifierOptions } from './services/error-classifier.js';
export { PooledApiClient } from './services/api.js';
export type { PooledApiClientOptions, RequestOptions, QueryValue } from './services/api.js';
export { HealthCheckService } from './services/health.js';
export type { HealthCheckResult, HealthStatus, ComponentHealth } from './services/health.js';
export { ConfigService, assertValidThresholds, parseKeyList } from './services/config.js';
export type { PoolSettings } from './services/config.js';
export { StructuredLogger, loggers, setLogLevel } from './lib/logger.js';
export type { LogContext, LogEntry, LogLevel, MinLogLevel } from './lib/logger.js';
export { getMetricsSnapshot, getMetricsContentType } from './lib/metrics.js';
export * from './types/credential.js';
export * from './types/errors.js';
export type { AppConfig } from './types/config.js';
