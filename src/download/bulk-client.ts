/**
 * 气象数据 API 客户端
 * 封装 /download/bulk、/files 与 /health 接口
 */

import axios, { AxiosAdapter, AxiosInstance, AxiosRequestConfig } from 'axios';
import { OpsLogger, createDownloadLogger } from '../common/utils/logger';
import { OpsError, OpsErrorType, toError } from '../common/utils/error-handler';
import { YearBlock, formatDate } from './date-range';

export interface BulkDownloadRequest {
  start_date: string;
  end_date: string;
  start_hour: number;
  end_hour: number;
  wind_only: boolean;
  /** null 表示全部城市 */
  cities: string[] | null;
}

export interface CityResult {
  city: string;
  success: boolean;
  rows?: number;
  file?: string;
  message?: string;
  error?: string;
}

export interface BulkDownloadResponse {
  result: CityResult[];
}

export interface HealthResponse {
  ok: boolean;
  time?: string;
}

export interface BulkRequestOptions {
  startHour: number;
  endHour: number;
  windOnly: boolean;
  cities: string[] | null;
}

export interface BulkDownloadClientOptions {
  /** API 基础地址，末尾斜杠会被去掉 */
  baseUrl: string;

  /** 请求超时（毫秒），0 表示不限制 */
  timeout?: number;

  /** 自定义 axios 适配器 */
  adapter?: AxiosAdapter;

  logger?: OpsLogger;
}

const USER_AGENT = 'climate-ops/1.0';

export function trimBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '');
}

export class BulkDownloadClient {
  readonly baseUrl: string;
  private readonly http: AxiosInstance;
  private readonly logger: OpsLogger;

  constructor(options: BulkDownloadClientOptions) {
    this.baseUrl = trimBaseUrl(options.baseUrl);
    this.logger = options.logger || createDownloadLogger('client');

    this.http = axios.create({
      timeout: options.timeout ?? 0,
      headers: {
        'Content-Type': 'application/json',
        'User-Agent': USER_AGENT
      },
      ...(options.adapter ? { adapter: options.adapter } : {})
    });

    this.setupInterceptors();
  }

  /**
   * 设置 axios 拦截器
   */
  private setupInterceptors(): void {
    this.http.interceptors.request.use(config => {
      this.logger.debug(`Sending ${config.method?.toUpperCase()} ${config.url}`, undefined, 'request');
      return config;
    });

    this.http.interceptors.response.use(response => {
      this.logger.debug(`Received ${response.status} from ${response.config.url}`, undefined, 'response');
      return response;
    });
  }

  buildRequest(block: YearBlock, options: BulkRequestOptions): BulkDownloadRequest {
    return {
      start_date: formatDate(block.start),
      end_date: formatDate(block.end),
      start_hour: options.startHour,
      end_hour: options.endHour,
      wind_only: options.windOnly,
      cities: options.cities
    };
  }

  /**
   * 为一个年度分块触发批量下载
   */
  async postBulk(block: YearBlock, options: BulkRequestOptions): Promise<BulkDownloadResponse> {
    const body = this.buildRequest(block, options);
    return this.request(
      { method: 'POST', url: `${this.baseUrl}/download/bulk`, data: body },
      parseBulkResponse,
      'postBulk'
    );
  }

  /**
   * 获取 API 已保存的文件列表
   */
  async listFiles(): Promise<string[]> {
    return this.request(
      { method: 'GET', url: `${this.baseUrl}/files` },
      parseFilesResponse,
      'listFiles'
    );
  }

  async health(): Promise<HealthResponse> {
    return this.request(
      { method: 'GET', url: `${this.baseUrl}/health` },
      parseHealthResponse,
      'health'
    );
  }

  private async request<T>(
    config: AxiosRequestConfig,
    parse: (data: unknown) => T,
    operation: string
  ): Promise<T> {
    let data: unknown;
    try {
      const response = await this.http.request<unknown>(config);
      data = response.data;
    } catch (error) {
      throw toRequestError(error, config, operation);
    }

    try {
      return parse(data);
    } catch (error) {
      throw new OpsError(
        `Unexpected response from ${config.url}: ${toError(error).message}`,
        OpsErrorType.HTTP_ERROR,
        'client',
        operation,
        { url: config.url }
      );
    }
  }
}

function toRequestError(error: unknown, config: AxiosRequestConfig, operation: string): OpsError {
  const details: Record<string, unknown> = { url: config.url, method: config.method };

  if (axios.isAxiosError(error)) {
    if (error.response) {
      details.status = error.response.status;
      details.body = error.response.data;
      return new OpsError(
        `${config.method} ${config.url} failed with status ${error.response.status}`,
        OpsErrorType.HTTP_ERROR,
        'client',
        operation,
        details
      );
    }
    details.code = error.code;
    return new OpsError(
      `${config.method} ${config.url} failed: ${error.message}`,
      OpsErrorType.NETWORK_ERROR,
      'client',
      operation,
      details
    );
  }

  return new OpsError(
    `${config.method} ${config.url} failed: ${error instanceof Error ? error.message : String(error)}`,
    OpsErrorType.UNKNOWN_ERROR,
    'client',
    operation,
    details
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalField<T>(
  record: Record<string, unknown>,
  key: string,
  guard: (value: unknown) => value is T
): T | undefined {
  const value = record[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!guard(value)) {
    throw new Error(`field "${key}" has an unexpected type`);
  }
  return value;
}

const isString = (value: unknown): value is string => typeof value === 'string';
const isNumber = (value: unknown): value is number => typeof value === 'number';

export function parseBulkResponse(data: unknown): BulkDownloadResponse {
  if (!isRecord(data) || !Array.isArray(data.result)) {
    throw new Error('expected an object with a "result" list');
  }

  const result = data.result.map((item: unknown, index: number): CityResult => {
    if (!isRecord(item) || typeof item.city !== 'string' || typeof item.success !== 'boolean') {
      throw new Error(`result[${index}] must have "city" and "success"`);
    }
    const cityResult: CityResult = { city: item.city, success: item.success };
    const rows = optionalField(item, 'rows', isNumber);
    const file = optionalField(item, 'file', isString);
    const message = optionalField(item, 'message', isString);
    const error = optionalField(item, 'error', isString);
    if (rows !== undefined) cityResult.rows = rows;
    if (file !== undefined) cityResult.file = file;
    if (message !== undefined) cityResult.message = message;
    if (error !== undefined) cityResult.error = error;
    return cityResult;
  });

  return { result };
}

export function parseFilesResponse(data: unknown): string[] {
  if (!isRecord(data) || !Array.isArray(data.files)) {
    throw new Error('expected an object with a "files" list');
  }
  const files: unknown[] = data.files;
  if (!files.every(isString)) {
    throw new Error('"files" must be a list of strings');
  }
  return files;
}

export function parseHealthResponse(data: unknown): HealthResponse {
  if (!isRecord(data) || typeof data.ok !== 'boolean') {
    throw new Error('expected an object with an "ok" flag');
  }
  return { ok: data.ok, time: optionalField(data, 'time', isString) };
}
