import type { Logger, LogLevel } from '../domain/services/Logger.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let defaultLevel: LogLevel = 'info';

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * createLogger() のデフォルトレベルを設定（CLI 起動時に1回）
 */
export function setDefaultLogLevel(level: LogLevel): void {
  defaultLevel = level;
}

/**
 * "[Tag] message" 形式で console に出力する Logger
 */
export function createLogger(tag: string, level: LogLevel = defaultLevel): Logger {
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= LEVEL_ORDER[level];
  const prefix = `[${tag}]`;

  return {
    debug: (message, ...args) => {
      if (enabled('debug')) console.debug(`🔍 ${prefix} ${message}`, ...args);
    },
    info: (message, ...args) => {
      if (enabled('info')) console.log(`${prefix} ${message}`, ...args);
    },
    warn: (message, ...args) => {
      if (enabled('warn')) console.warn(`⚠️ ${prefix} ${message}`, ...args);
    },
    error: (message, ...args) => {
      if (enabled('error')) console.error(`❌ ${prefix} ${message}`, ...args);
    },
  };
}

/**
 * 何も出力しない Logger（テスト用）
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
