/**
 * 运维工具日志系统
 * 提供结构化的日志记录功能，支持控制台与文件双路输出
 */

import fs from 'fs';
import path from 'path';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal'
}

export interface LogEntry {
  /** 日志级别 */
  level: LogLevel;

  /** 日志消息 */
  message: string;

  /** 模块名称 */
  module: string;

  /** 操作名称 */
  operation?: string;

  /** 时间戳 */
  timestamp: Date;

  /** 额外数据 */
  data?: Record<string, unknown>;

  /** 错误对象 */
  error?: Error;
}

export interface LoggerOptions {
  /** 最小日志级别 */
  minLevel?: LogLevel;

  /** 是否启用控制台输出 */
  consoleOutput?: boolean;

  /** 文件输出路径，设置后每条日志同时追加到该文件 */
  filePath?: string;

  /** 模块名称 */
  moduleName?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
  [LogLevel.FATAL]: 4
};

/**
 * 将字符串解析为日志级别，无法识别时返回 undefined
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  return Object.values(LogLevel).find(level => level === normalized);
}

export class OpsLogger {
  private options: LoggerOptions;
  private readonly parent?: OpsLogger;
  private fileReady = false;

  constructor(options: LoggerOptions = {}, parent?: OpsLogger) {
    this.parent = parent;
    this.options = {
      minLevel: LogLevel.INFO,
      consoleOutput: true,
      moduleName: 'ops',
      ...options
    };
  }

  /**
   * 更新日志配置（子日志器沿用根日志器的级别与输出设置）
   */
  configure(options: Omit<LoggerOptions, 'moduleName'>): void {
    const root = this.root();
    if (options.filePath !== root.options.filePath) {
      root.fileReady = false;
    }
    root.options = { ...root.options, ...options };
  }

  get moduleName(): string {
    return this.options.moduleName || 'ops';
  }

  debug(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.DEBUG, message, data, operation);
  }

  info(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.INFO, message, data, operation);
  }

  warn(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.WARN, message, data, operation);
  }

  error(message: string, error?: Error, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.ERROR, message, data, operation, error);
  }

  fatal(message: string, error?: Error, data?: Record<string, unknown>, operation?: string): void {
    this.log(LogLevel.FATAL, message, data, operation, error);
  }

  /**
   * 创建子模块日志器
   */
  createSubLogger(moduleName: string): OpsLogger {
    return new OpsLogger({ moduleName: `${this.moduleName}.${moduleName}` }, this.root());
  }

  private root(): OpsLogger {
    return this.parent ? this.parent.root() : this;
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    operation?: string,
    error?: Error
  ): void {
    const settings = this.root().options;

    if (LEVEL_ORDER[level] < LEVEL_ORDER[settings.minLevel || LogLevel.INFO]) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      module: this.moduleName,
      operation,
      timestamp: new Date(),
      data,
      error
    };

    const line = formatLogEntry(entry);

    if (settings.consoleOutput) {
      this.writeToConsole(entry.level, line);
    }

    if (settings.filePath) {
      this.root().writeToFile(settings.filePath, line);
    }
  }

  private writeToConsole(level: LogLevel, line: string): void {
    switch (level) {
      case LogLevel.DEBUG:
        console.debug(line);
        break;
      case LogLevel.INFO:
        console.info(line);
        break;
      case LogLevel.WARN:
        console.warn(line);
        break;
      case LogLevel.ERROR:
      case LogLevel.FATAL:
        console.error(line);
        break;
    }
  }

  private writeToFile(filePath: string, line: string): void {
    try {
      if (!this.fileReady) {
        fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
        this.fileReady = true;
      }
      fs.appendFileSync(filePath, `${line}\n`, 'utf-8');
    } catch (error) {
      console.error(`Failed to write log file ${filePath}:`, error instanceof Error ? error.message : String(error));
    }
  }
}

/**
 * 格式化单条日志
 */
export function formatLogEntry(entry: LogEntry): string {
  const timestamp = entry.timestamp.toISOString();
  const levelStr = entry.level.toUpperCase().padEnd(5);
  const operationStr = entry.operation ? ` [${entry.operation}]` : '';

  let line = `${timestamp} ${levelStr} [${entry.module}]${operationStr} ${entry.message}`;

  if (entry.error) {
    line += `\nError: ${entry.error.message}`;
    if (entry.error.stack) {
      line += `\nStack: ${entry.error.stack}`;
    }
  }

  if (entry.data && Object.keys(entry.data).length > 0) {
    line += `\nData: ${JSON.stringify(entry.data, null, 2)}`;
  }

  return line;
}

/**
 * 默认日志器实例
 */
export const defaultLogger = new OpsLogger();

export function createLauncherLogger(): OpsLogger {
  return defaultLogger.createSubLogger('launcher');
}

export function createDownloadLogger(component: string): OpsLogger {
  return defaultLogger.createSubLogger(`download.${component}`);
}
