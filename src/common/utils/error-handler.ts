/**
 * 运维工具错误处理
 * 统一的错误类型与按类型分级的日志记录
 */

import { OpsLogger, defaultLogger } from './logger';

export enum OpsErrorType {
  /** 网络错误（连接失败、超时） */
  NETWORK_ERROR = 'network_error',

  /** HTTP 状态码错误 */
  HTTP_ERROR = 'http_error',

  /** 配置错误 */
  CONFIGURATION_ERROR = 'configuration_error',

  /** 锁冲突或锁目录异常 */
  LOCK_ERROR = 'lock_error',

  /** 子进程或端口相关错误 */
  PROCESS_ERROR = 'process_error',

  /** 文件系统错误 */
  FILESYSTEM_ERROR = 'filesystem_error',

  /** 未知错误 */
  UNKNOWN_ERROR = 'unknown_error',

  /** 致命错误 */
  FATAL_ERROR = 'fatal_error'
}

export interface OpsErrorContext {
  /** 错误类型 */
  errorType: OpsErrorType;

  /** 组件名称 */
  component?: string;

  /** 操作名称 */
  operation?: string;

  /** 错误发生时间 */
  timestamp: Date;

  /** 错误详情 */
  details?: Record<string, unknown>;
}

export class OpsError extends Error {
  public readonly context: OpsErrorContext;

  constructor(
    message: string,
    errorType: OpsErrorType,
    component?: string,
    operation?: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'OpsError';
    this.context = {
      errorType,
      component,
      operation,
      timestamp: new Date(),
      details
    };
  }

  get errorType(): OpsErrorType {
    return this.context.errorType;
  }

  toString(): string {
    return `[${this.context.errorType}] ${this.message} (Component: ${this.context.component || 'unknown'}, Operation: ${this.context.operation || 'unknown'})`;
  }
}

/**
 * 将任意抛出值规范化为 Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * 读取系统错误码（如 ENOENT、ESRCH），没有时返回 undefined
 */
export function errorCode(error: unknown): unknown {
  return error instanceof Error && 'code' in error ? error.code : undefined;
}

export class OpsErrorHandler {
  private logger: OpsLogger;

  constructor(logger?: OpsLogger) {
    this.logger = logger || defaultLogger.createSubLogger('error-handler');
  }

  /**
   * 处理错误：合并上下文后按类型记录日志，返回最终的错误上下文
   */
  handleError(error: Error, context?: Partial<OpsErrorContext>): OpsErrorContext {
    const errorContext: OpsErrorContext = {
      errorType: OpsErrorType.UNKNOWN_ERROR,
      timestamp: new Date(),
      ...context
    };

    if (error instanceof OpsError) {
      errorContext.errorType = error.context.errorType;
      errorContext.component = error.context.component || errorContext.component;
      errorContext.operation = error.context.operation || errorContext.operation;
      errorContext.details = {
        ...error.context.details,
        ...errorContext.details
      };
    }

    this.logError(error, errorContext);
    return errorContext;
  }

  private logError(error: Error, context: OpsErrorContext): void {
    const logData = {
      errorType: context.errorType,
      component: context.component,
      details: context.details
    };

    switch (context.errorType) {
      case OpsErrorType.NETWORK_ERROR:
      case OpsErrorType.HTTP_ERROR:
        this.logger.warn(`Request ${context.errorType}: ${error.message}`, logData, context.operation);
        break;

      case OpsErrorType.LOCK_ERROR:
        this.logger.warn(`Lock error: ${error.message}`, logData, context.operation);
        break;

      case OpsErrorType.CONFIGURATION_ERROR:
        this.logger.error(`Configuration error: ${error.message}`, error, logData, context.operation);
        break;

      case OpsErrorType.FATAL_ERROR:
        this.logger.fatal(`Fatal error: ${error.message}`, error, logData, context.operation);
        break;

      default:
        this.logger.error(`Operation failed: ${error.message}`, error, logData, context.operation);
    }
  }

  /**
   * 创建错误包装函数：记录后继续抛出
   */
  wrapOperation<T>(
    operation: () => Promise<T>,
    component?: string,
    operationName?: string
  ): () => Promise<T> {
    return async (): Promise<T> => {
      try {
        return await operation();
      } catch (error) {
        this.handleError(toError(error), { component, operation: operationName });
        throw error;
      }
    };
  }
}
