/**
 * Hourly Daemon
 *
 * Runs the bulk-download cycle at minute 1 of every hour using node-cron,
 * guarded by a directory lock so only one daemon runs at a time.
 */

import * as cron from 'node-cron';
import { EventEmitter } from 'events';
import { DownloadConfig } from '../common/config/config-manager';
import { OpsLogger, createDownloadLogger } from '../common/utils/logger';
import { OpsError, OpsErrorHandler, OpsErrorType, toError } from '../common/utils/error-handler';
import { Clock, systemClock, wallClock } from '../common/utils/time';
import { BulkDownloadDriver, CycleReport } from './bulk-download-driver';
import { DirectoryLock, ExitHookTarget } from './directory-lock';

export const MINUTE_ONE_CRON = '1 * * * *';

export interface CronJob {
  stop(): void;
}

export interface CronScheduler {
  validate(expression: string): boolean;
  schedule(expression: string, task: () => void, timezone?: string): CronJob;
}

export const nodeCronScheduler: CronScheduler = {
  validate: expression => cron.validate(expression),
  schedule: (expression, task, timezone) => cron.schedule(expression, task, {
    scheduled: true,
    ...(timezone ? { timezone } : {})
  })
};

export type DaemonDriver = Pick<BulkDownloadDriver, 'runOnce' | 'clean'>;
export type DaemonLock = Pick<DirectoryLock, 'lockDir' | 'acquire' | 'release' | 'releaseOnExit' | 'readOwner'>;

export interface HourlyDaemonDeps {
  driver: DaemonDriver;
  lock: DaemonLock;
  scheduler?: CronScheduler;
  clock?: Clock;
  exitHooks?: ExitHookTarget;
  logger?: OpsLogger;
}

export interface DaemonStatus {
  started: boolean;
  isRunning: boolean;
  runCount: number;
  successCount: number;
  failureCount: number;
  skippedCount: number;
  lastRun: Date | null;
  lastError: string | null;
}

/**
 * 距离下一个 HH:01:00 的秒数（当前处于 HH:00 时为本小时的 01 分），按调度时区的墙上时间计算
 */
export function secondsUntilMinuteOne(now: Date, timeZone?: string): number {
  const { minute: minutes, second: seconds } = wallClock(now, timeZone);
  const wait = minutes < 1
    ? (1 - minutes) * 60 - seconds
    : ((60 - minutes) + 1) * 60 - seconds;
  return Math.max(wait, 0);
}

export class HourlyDaemon extends EventEmitter {
  private readonly config: DownloadConfig;
  private readonly driver: DaemonDriver;
  private readonly lock: DaemonLock;
  private readonly scheduler: CronScheduler;
  private readonly clock: Clock;
  private readonly exitHooks?: ExitHookTarget;
  private readonly logger: OpsLogger;
  private readonly errorHandler: OpsErrorHandler;

  private job: CronJob | null = null;
  private stopped: Promise<void>;
  private resolveStopped: () => void = () => undefined;
  private status: DaemonStatus = {
    started: false,
    isRunning: false,
    runCount: 0,
    successCount: 0,
    failureCount: 0,
    skippedCount: 0,
    lastRun: null,
    lastError: null
  };

  constructor(config: DownloadConfig, deps: HourlyDaemonDeps) {
    super();
    this.config = config;
    this.driver = deps.driver;
    this.lock = deps.lock;
    this.scheduler = deps.scheduler || nodeCronScheduler;
    this.clock = deps.clock || systemClock;
    this.exitHooks = deps.exitHooks;
    this.logger = deps.logger || createDownloadLogger('daemon');
    this.errorHandler = new OpsErrorHandler(this.logger);
    this.stopped = new Promise(resolve => {
      this.resolveStopped = resolve;
    });
  }

  getStatus(): DaemonStatus {
    return { ...this.status };
  }

  /**
   * 获取锁并开始调度；锁已被占用时返回 false
   */
  start(): boolean {
    if (this.status.started) {
      return true;
    }

    if (!this.scheduler.validate(MINUTE_ONE_CRON)) {
      throw new OpsError(`Invalid cron expression: ${MINUTE_ONE_CRON}`, OpsErrorType.CONFIGURATION_ERROR, 'daemon', 'start');
    }

    if (!this.lock.acquire()) {
      const owner = this.lock.readOwner();
      this.logger.warn(
        `🔒 Another instance is already running (lock: ${this.lock.lockDir}). Exiting.`,
        owner ? { pid: owner.pid, startedAt: owner.startedAt } : undefined,
        'start'
      );
      return false;
    }

    this.lock.releaseOnExit(this.exitHooks);
    this.status.started = true;

    this.logger.info('🟢 Daemon mode: the download runs only at minute 1 of every hour.', {
      lockDir: this.lock.lockDir,
      timezone: this.config.timezone
    }, 'start');

    this.job = this.scheduler.schedule(MINUTE_ONE_CRON, () => {
      this.tick().catch(error => {
        this.errorHandler.handleError(toError(error), { component: 'daemon', operation: 'tick' });
      });
    }, this.config.timezone);

    this.logWait();
    this.emit('started');
    return true;
  }

  /**
   * 执行一轮；上一轮尚未结束时跳过本次触发
   */
  async tick(): Promise<CycleReport | undefined> {
    if (this.status.isRunning) {
      this.status.skippedCount++;
      this.logger.warn('Previous cycle still running, skipping this tick', undefined, 'tick');
      this.emit('skipped');
      return undefined;
    }

    this.status.isRunning = true;
    this.status.runCount++;
    this.status.lastRun = this.clock();
    this.emit('cycleStarted');

    try {
      // --clean-each 先行清理并取代 --clean；单独的 --clean 每轮都生效
      if (this.config.cleanEach) {
        await this.driver.clean();
      }
      const report = await this.driver.runOnce({ clean: this.config.clean && !this.config.cleanEach });

      this.status.successCount++;
      this.status.lastError = null;
      this.emit('cycleCompleted', report);
      return report;
    } catch (error) {
      const err = toError(error);
      this.status.failureCount++;
      this.status.lastError = err.message;
      this.errorHandler.handleError(err, { component: 'daemon', operation: 'tick' });
      this.emit('cycleFailed', err);
      return undefined;
    } finally {
      this.status.isRunning = false;
      if (this.job) {
        this.logWait();
      }
    }
  }

  /**
   * 停止调度并释放锁
   */
  stop(): void {
    if (this.job) {
      this.job.stop();
      this.job = null;
    }
    if (this.status.started) {
      this.lock.release();
      this.status.started = false;
      this.logger.info('Daemon stopped', undefined, 'stop');
      this.emit('stopped');
    }
    this.resolveStopped();
  }

  waitUntilStopped(): Promise<void> {
    return this.stopped;
  }

  private logWait(): void {
    const seconds = secondsUntilMinuteOne(this.clock(), this.config.timezone);
    this.logger.info(`⏳ Sleeping ${seconds}s until the next HH:01...`, undefined, 'schedule');
  }
}
