/**
 * Structured Logger - 結構化日誌系統
 * JSON 格式日誌，支持 ELK、DataDog 等中央日誌系統
 * 特性：
 *   - JSON 格式輸出（易於機器解析）
 *   - 日誌級別控制
 *   - requestId 追蹤
 *   - 錯誤堆棧記錄
 */

import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** 最小級別可設為 silent 以關閉輸出 */
export type MinLogLevel = LogLevel | 'silent';

export interface LogContext {
  /** 請求唯一識別碼，用於追蹤一次 execute 的完整生命週期 */
  requestId?: string;
  /** 憑證 pool index */
  credentialIndex?: number;
  /** 憑證顯示識別碼（絕不放完整 secret） */
  identifier?: string;
  /** 第幾次嘗試 */
  attempt?: number;
  /** 執行時間（毫秒） */
  duration?: number;
  /** 自定義數據 */
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
  metadata?: Record<string, unknown>;
}

export interface LoggerConfig {
  /** 最小日誌級別 (default: QUOTA_LOG_LEVEL 或 'info') */
  minLevel?: MinLogLevel;
  /** 是否輸出到控制台 (default: true) */
  console?: boolean;
  /** 自定義格式化函數 */
  formatter?: (entry: LogEntry) => string;
  /** 是否包含堆棧追蹤 (default: true) */
  includeStack?: boolean;
}

/** 日誌級別優先級 */
const LOG_LEVEL_PRIORITY: Record<MinLogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isMinLogLevel(value: string): value is MinLogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

function defaultMinLevel(): MinLogLevel {
  const fromEnv = process.env.QUOTA_LOG_LEVEL;
  return fromEnv && isMinLogLevel(fromEnv) ? fromEnv : 'info';
}

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * 結構化日誌記錄器
 * 所有日誌都以 JSON 格式輸出，便於中央日誌系統解析
 */
export class StructuredLogger {
  private component: string;
  private config: Required<LoggerConfig>;
  private requestIdStack: string[] = [];

  constructor(component: string, config: LoggerConfig = {}) {
    this.component = component;
    this.config = {
      minLevel: config.minLevel || defaultMinLevel(),
      console: config.console !== false,
      formatter: config.formatter || this.defaultFormatter,
      includeStack: config.includeStack !== false,
    };
  }

  private defaultFormatter = (entry: LogEntry): string => {
    return JSON.stringify(entry);
  };

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.minLevel];
  }

  private output(entry: LogEntry): void {
    if (!this.config.console) return;

    const formatted = this.config.formatter(entry);

    // 根據日誌級別選擇輸出方法
    switch (entry.level) {
      case 'error':
        console.error(formatted);
        break;
      case 'warn':
        console.warn(formatted);
        break;
      case 'debug':
        console.debug(formatted);
        break;
      case 'info':
      default:
        console.log(formatted);
    }
  }

  debug(message: string, context?: LogContext, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;

    this.log('debug', message, context, metadata);
  }

  info(message: string, context?: LogContext, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;

    this.log('info', message, context, metadata);
  }

  warn(message: string, context?: LogContext, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;

    this.log('warn', message, context, metadata);
  }

  /**
   * 記錄 ERROR 級別日誌
   */
  error(
    message: string,
    error?: Error | null,
    context?: LogContext,
    metadata?: Record<string, unknown>
  ): void {
    if (!this.shouldLog('error')) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: 'error',
      message,
      component: this.component,
      context: this.enrichContext(context),
      metadata,
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        code: errorCode(error),
        stack: this.config.includeStack ? error.stack : undefined,
      };
    }

    this.output(entry);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: LogContext,
    metadata?: Record<string, unknown>
  ): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      component: this.component,
      context: this.enrichContext(context),
      metadata,
    };

    this.output(entry);
  }

  /**
   * 增強上下文信息
   * 自動添加 requestId（如果存在）
   */
  private enrichContext(context?: LogContext): LogContext | undefined {
    const current = this.getCurrentRequestId();

    if (!context) {
      return current ? { requestId: current } : undefined;
    }

    if (!context.requestId && current) {
      return { ...context, requestId: current };
    }

    return context;
  }

  /**
   * 推入新的 requestId（支持嵌套請求）
   */
  pushRequestId(requestId?: string): string {
    const id = requestId || randomUUID();
    this.requestIdStack.push(id);
    return id;
  }

  popRequestId(): string | undefined {
    return this.requestIdStack.pop();
  }

  getCurrentRequestId(): string | undefined {
    return this.requestIdStack[this.requestIdStack.length - 1];
  }

  setMinLevel(level: MinLogLevel): void {
    this.config.minLevel = level;
  }

  getMinLevel(): MinLogLevel {
    return this.config.minLevel;
  }

  /**
   * 執行帶日誌的非同步操作
   */
  async trackAsync<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: Omit<LogContext, 'duration'>
  ): Promise<T> {
    const startTime = Date.now();

    try {
      const result = await fn();

      this.info(`${operation} 完成`, {
        ...context,
        duration: Date.now() - startTime,
      });

      return result;
    } catch (error) {
      this.error(
        `${operation} 失敗`,
        error instanceof Error ? error : new Error(String(error)),
        {
          ...context,
          duration: Date.now() - startTime,
        }
      );

      throw error;
    }
  }
}

/**
 * 預設的日誌記錄器實例
 * 按組件分類，便於按服務過濾日誌
 */
export const loggers = {
  pool: new StructuredLogger('KeyPool'),
  executor: new StructuredLogger('Executor'),
  store: new StructuredLogger('CredentialStore'),
  api: new StructuredLogger('API'),
  config: new StructuredLogger('Config'),
};

/**
 * 一次調整所有預設 logger 的級別（CLI -v / -q 使用）
 */
export function setLogLevel(level: MinLogLevel): void {
  for (const logger of Object.values(loggers)) {
    logger.setMinLevel(level);
  }
}
