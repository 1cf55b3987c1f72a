/**
 * 批量下载驱动
 * 按年度分块依次调用 /download/bulk，最后列出 API 报告的文件
 */

import { DownloadConfig } from '../common/config/config-manager';
import { OpsLogger, createDownloadLogger } from '../common/utils/logger';
import { OpsError, OpsErrorHandler, OpsErrorType, toError } from '../common/utils/error-handler';
import { Clock, SleepFn, sleep, systemClock } from '../common/utils/time';
import {
  BulkDownloadClient,
  BulkDownloadRequest,
  BulkDownloadResponse,
  BulkRequestOptions
} from './bulk-client';
import { CleanResult, ConfirmFn, cleanCsvFiles } from './csv-cleaner';
import {
  DateSpan,
  YearBlock,
  computeSpan,
  describeBlock,
  formatDate,
  partitionIntoYearBlocks
} from './date-range';

export type BulkClient = Pick<BulkDownloadClient, 'baseUrl' | 'buildRequest' | 'postBulk' | 'listFiles'>;

export interface DriverDeps {
  client: BulkClient;
  clock?: Clock;
  sleep?: SleepFn;
  confirm?: ConfirmFn;
  logger?: OpsLogger;
}

export interface BlockSummary {
  cities: number;
  succeeded: number;
  failed: number;
  rows: number;
  failures: Array<{ city: string; error: string }>;
}

export interface BlockOutcome {
  block: YearBlock;
  request: BulkDownloadRequest;
  /** API 返回非 2xx 时为空，错误信息记录在 error 中 */
  response?: BulkDownloadResponse;
  summary?: BlockSummary;
  error?: string;
}

export interface DownloadPlan {
  span: DateSpan;
  blocks: YearBlock[];
}

export interface CycleReport {
  startedAt: Date;
  finishedAt: Date;
  span: DateSpan;
  blocks: BlockOutcome[];
  files: string[];
  cleaned?: CleanResult;
}

export interface RunOptions {
  /** 是否在下载前清理 CSV，默认取配置中的 clean */
  clean?: boolean;
}

export function summarizeBlock(response: BulkDownloadResponse): BlockSummary {
  const summary: BlockSummary = { cities: 0, succeeded: 0, failed: 0, rows: 0, failures: [] };

  for (const item of response.result) {
    summary.cities++;
    if (item.success) {
      summary.succeeded++;
      summary.rows += item.rows ?? 0;
    } else {
      summary.failed++;
      summary.failures.push({ city: item.city, error: item.error || 'unknown error' });
    }
  }

  return summary;
}

export class BulkDownloadDriver {
  private readonly config: DownloadConfig;
  private readonly client: BulkClient;
  private readonly clock: Clock;
  private readonly sleep: SleepFn;
  private readonly confirm?: ConfirmFn;
  private readonly logger: OpsLogger;
  private readonly errorHandler: OpsErrorHandler;

  constructor(config: DownloadConfig, deps: DriverDeps) {
    this.config = config;
    this.client = deps.client;
    this.clock = deps.clock || systemClock;
    this.sleep = deps.sleep || sleep;
    this.confirm = deps.confirm;
    this.logger = deps.logger || createDownloadLogger('driver');
    this.errorHandler = new OpsErrorHandler(this.logger);
  }

  get requestOptions(): BulkRequestOptions {
    return {
      startHour: this.config.startHour,
      endHour: this.config.endHour,
      windOnly: this.config.windOnly,
      cities: this.config.cities
    };
  }

  /**
   * 以当前时刻计算区间与分块（每次运行重新计算）
   */
  plan(): DownloadPlan {
    const span = computeSpan(this.clock(), this.config.yearsBack, this.config.timezone);
    return { span, blocks: partitionIntoYearBlocks(span) };
  }

  /**
   * 清理本地 CSV；失败只记录日志，不中断下载
   */
  async clean(): Promise<CleanResult | undefined> {
    try {
      return await cleanCsvFiles(this.config.dataDir, {
        assumeYes: this.config.assumeYes,
        confirm: this.confirm,
        logger: this.logger
      });
    } catch (error) {
      this.errorHandler.handleError(toError(error), { component: 'driver', operation: 'clean' });
      return undefined;
    }
  }

  /**
   * 执行一轮完整下载
   * HTTP 状态错误只记录在该分块上并继续；网络错误中止本轮并抛出
   */
  async runOnce(options: RunOptions = {}): Promise<CycleReport> {
    const startedAt = this.clock();
    const { span, blocks } = this.plan();
    const c = this.config;

    this.logger.info(`🚀 Downloading ${c.yearsBack}y back using ${this.client.baseUrl}`, undefined, 'runOnce');
    this.logger.info(`    Hours: ${c.startHour}:00 - ${c.endHour}:00 | wind_only=${c.windOnly}`, undefined, 'runOnce');
    this.logger.info(`    Local DATA_DIR: ${c.dataDir}`, undefined, 'runOnce');
    this.logger.info(`    Total span: ${formatDate(span.start)} → ${formatDate(span.end)}`, undefined, 'runOnce');

    const report: CycleReport = { startedAt, finishedAt: startedAt, span, blocks: [], files: [] };

    if (options.clean ?? c.clean) {
      report.cleaned = await this.clean();
    }

    for (let i = 0; i < blocks.length; i++) {
      const block = blocks[i];
      this.logger.info(`📦 Block: ${describeBlock(block)}`, undefined, 'runOnce');

      const request = this.client.buildRequest(block, this.requestOptions);
      report.blocks.push(await this.postBlock(block, request));

      if (i < blocks.length - 1 && c.sleepBetween > 0) {
        await this.sleep(c.sleepBetween * 1000);
      }
    }

    report.files = await this.client.listFiles();
    this.logger.info('📁 Files reported by the API (/files):', { files: report.files }, 'runOnce');

    report.finishedAt = this.clock();
    return report;
  }

  private async postBlock(block: YearBlock, request: BulkDownloadRequest): Promise<BlockOutcome> {
    let response: BulkDownloadResponse;
    try {
      response = await this.client.postBulk(block, this.requestOptions);
    } catch (error) {
      if (error instanceof OpsError && error.errorType === OpsErrorType.HTTP_ERROR) {
        this.logger.warn(`Block failed: ${error.message}`, { block: describeBlock(block), ...error.context.details }, 'runOnce');
        return { block, request, error: error.message };
      }
      throw error;
    }

    const summary = summarizeBlock(response);
    this.logger.info(
      `Block done: ${summary.succeeded}/${summary.cities} cities ok, ${summary.rows} rows`,
      undefined,
      'runOnce'
    );
    for (const failure of summary.failures) {
      this.logger.warn(`City ${failure.city} failed: ${failure.error}`, { block: describeBlock(block) }, 'runOnce');
    }
    return { block, request, response, summary };
  }
}
