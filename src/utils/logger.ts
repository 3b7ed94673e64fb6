/**
 * Logger 工具 - 命令層的診斷輸出
 *
 * 核心分析元件不直接寫日誌，只回傳診斷資訊；由命令層決定如何輸出。
 * 所有輸出走 console（stderr 以外的結果由 oclif 的 this.log 負責）。
 */

import chalk from 'chalk';

/**
 * 日誌等級
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4,
}

export interface LoggerOptions {
  /** 顯示 DEBUG 訊息（--verbose） */
  verbose?: boolean;
  minLevel?: LogLevel;
  /** 預設：true */
  useColors?: boolean;
  /** 預設：false */
  showTimestamp?: boolean;
  /** 子 Logger 以 `:` 串接 */
  prefix?: string;
}

type ConsoleMethod = 'debug' | 'info' | 'warn' | 'error';

interface LevelStyle {
  label: string;
  paint: (text: string) => string;
  method: ConsoleMethod;
}

// 標籤補齊為相同寬度
const LEVEL_STYLES: Record<Exclude<LogLevel, LogLevel.NONE>, LevelStyle> = {
  [LogLevel.DEBUG]: { label: '[DEBUG]', paint: chalk.gray, method: 'debug' },
  [LogLevel.INFO]: { label: '[INFO] ', paint: chalk.blue, method: 'info' },
  [LogLevel.WARN]: { label: '[WARN] ', paint: chalk.yellow, method: 'warn' },
  [LogLevel.ERROR]: { label: '[ERROR]', paint: chalk.red, method: 'error' },
};

export class Logger {
  private readonly options: Required<LoggerOptions>;

  constructor(options: LoggerOptions = {}) {
    this.options = {
      verbose: options.verbose ?? false,
      minLevel: options.minLevel ?? (options.verbose ? LogLevel.DEBUG : LogLevel.INFO),
      useColors: options.useColors ?? true,
      showTimestamp: options.showTimestamp ?? false,
      prefix: options.prefix ?? '',
    };
  }

  private enabled(level: LogLevel): boolean {
    return level >= this.options.minLevel;
  }

  private emit(level: Exclude<LogLevel, LogLevel.NONE>, message: string, args: unknown[]): void {
    if (!this.enabled(level)) return;

    const style = LEVEL_STYLES[level];
    const head: string[] = [];
    if (this.options.showTimestamp) head.push(`[${new Date().toISOString()}]`);
    if (this.options.prefix) head.push(`[${this.options.prefix}]`);
    head.push(this.options.useColors ? style.paint(style.label) : style.label);

    console[style.method](`${head.join(' ')} ${message}`, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.emit(LogLevel.DEBUG, message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.emit(LogLevel.INFO, message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.emit(LogLevel.WARN, message, args);
  }

  /**
   * ERROR 等級日誌；verbose 模式下附上堆疊
   */
  error(message: string, error?: unknown, ...args: unknown[]): void {
    if (error instanceof Error) {
      this.emit(LogLevel.ERROR, message, [error.message, ...args]);
      if (this.options.verbose && error.stack && this.enabled(LogLevel.ERROR)) {
        console.error(chalk.gray(error.stack));
      }
      return;
    }

    this.emit(LogLevel.ERROR, message, error === undefined ? args : [error, ...args]);
  }

  /**
   * 記錄單一項目的資料品質警告（標題一行，每則訊息縮排一行）
   */
  dataQuality(itemId: string, messages: readonly string[]): void {
    if (messages.length === 0) return;

    this.warn(`資料品質: ${itemId}`);
    messages.forEach((message) => this.warn(`  - ${message}`));
  }

  performance(operation: string, durationMs: number): void {
    this.debug(`效能: ${operation} 完成於 ${durationMs.toFixed(1)}ms`);
  }

  child(prefix: string): Logger {
    return new Logger({
      ...this.options,
      prefix: this.options.prefix ? `${this.options.prefix}:${prefix}` : prefix,
    });
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}
