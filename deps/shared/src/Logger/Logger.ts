export const logLevels = ["trace", "debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof logLevels)[number];

export type LogContext = {
  /** 事件名稱，會取代 level 顯示於訊息前 */
  event?: string;
  emoji?: string;
  error?: unknown;
  [key: string]: unknown;
};

export type TemplateLog = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

/**
 * 三種呼叫方式：
 * - logger.info("訊息")
 * - logger.info({ count }, "訊息")
 * - logger.info({ count })`共 ${count} 筆`
 */
export interface LogMethod {
  (message: string): void;
  (context: LogContext, message: string): void;
  (context?: LogContext): TemplateLog;
}

export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  /** 新增命名空間，輸出時以 `a:b` 表示 */
  extend(name: string, context?: LogContext): Logger;
  /** 只合併 context，不改變命名空間 */
  append(context: LogContext): Logger;
}

export type LogRecord = {
  time: string;
  level: LogLevel;
  path: string;
  event?: string;
  msg: string;
  context: Record<string, unknown>;
  err?: { name: string; message: string; stack?: string };
};

export interface LogTransport extends AsyncDisposable {
  write(record: LogRecord): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return logLevels.some((l) => l === value);
}

export function levelEnabled(threshold: LogLevel, level: LogLevel) {
  return logLevels.indexOf(level) >= logLevels.indexOf(threshold);
}
