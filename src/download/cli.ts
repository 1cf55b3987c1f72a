#!/usr/bin/env node

/**
 * 近十年历史气象批量下载命令行工具
 * 单次运行，或以守护模式在每小时第 1 分钟运行
 */

import { Command } from 'commander';
import { Table } from 'console-table-printer';
import chalk from 'chalk';
import { ConfigManager, DownloadConfig, assertValid, validateDownloadConfig } from '../common/config/config-manager';
import { defaultLogger } from '../common/utils/logger';
import { OpsErrorHandler, toError } from '../common/utils/error-handler';
import { parseInteger, parseList, parseNonNegativeNumber } from '../common/utils/cli-options';
import { BulkDownloadClient } from './bulk-client';
import { BulkClient, BulkDownloadDriver, DownloadPlan } from './bulk-download-driver';
import { formatDate } from './date-range';
import { DirectoryLock, ExitHookTarget } from './directory-lock';
import { CronScheduler, DaemonLock, HourlyDaemon } from './hourly-daemon';

export interface DownloadCliOptions {
  clean?: boolean;
  cleanEach?: boolean;
  yes?: boolean;
  dataDir?: string;
  startHour?: number;
  endHour?: number;
  windOnly?: boolean;
  sleep?: number;
  daemonMin1?: boolean;
  log?: string;
  years?: number;
  cities?: string[] | null;
  lockDir?: string;
  timeout?: number;
  timezone?: string;
  dryRun?: boolean;
}

export interface DownloadProgramDeps {
  loadConfig?: () => ConfigManager;
  createClient?: (config: DownloadConfig) => BulkClient;
  createLock?: (lockDir: string) => DaemonLock;
  scheduler?: CronScheduler;
  exitHooks?: ExitHookTarget;
  print?: (text: string) => void;
  exit?: (code: number) => void;
}

/**
 * 命令行参数覆盖配置
 */
export function applyDownloadFlags(
  base: DownloadConfig,
  baseUrl: string | undefined,
  options: DownloadCliOptions
): DownloadConfig {
  return {
    ...base,
    baseUrl: baseUrl ?? base.baseUrl,
    clean: options.clean ?? base.clean,
    cleanEach: options.cleanEach ?? base.cleanEach,
    assumeYes: options.yes ?? base.assumeYes,
    dataDir: options.dataDir ?? base.dataDir,
    startHour: options.startHour ?? base.startHour,
    endHour: options.endHour ?? base.endHour,
    windOnly: options.windOnly ?? base.windOnly,
    sleepBetween: options.sleep ?? base.sleepBetween,
    daemon: options.daemonMin1 ?? base.daemon,
    logFile: options.log ?? base.logFile,
    yearsBack: options.years ?? base.yearsBack,
    cities: options.cities !== undefined ? options.cities : base.cities,
    lockDir: options.lockDir ?? base.lockDir,
    requestTimeout: options.timeout ?? base.requestTimeout,
    timezone: options.timezone ?? base.timezone,
    dryRun: options.dryRun ?? base.dryRun
  };
}

/**
 * 以表格形式渲染下载计划
 */
export function renderPlan(plan: DownloadPlan): string {
  const table = new Table({
    columns: [
      { name: 'block', title: '#', alignment: 'right' },
      { name: 'start', title: 'start_date', alignment: 'left' },
      { name: 'end', title: 'end_date', alignment: 'left' }
    ]
  });

  plan.blocks.forEach((block, index) => {
    table.addRow({ block: index + 1, start: formatDate(block.start), end: formatDate(block.end) });
  });

  return table.render();
}

export function createDownloadProgram(deps: DownloadProgramDeps = {}): Command {
  const loadConfig = deps.loadConfig || (() => new ConfigManager());
  const createClient = deps.createClient || ((config: DownloadConfig) => new BulkDownloadClient({
    baseUrl: config.baseUrl,
    timeout: config.requestTimeout
  }));
  const createLock = deps.createLock || ((lockDir: string) => new DirectoryLock(lockDir));
  const print = deps.print || ((text: string) => console.log(text));
  const exit = deps.exit || ((code: number) => process.exit(code));

  const program = new Command();

  program
    .name('download-10y')
    .description('按年度分块触发近十年的历史气象批量下载')
    .version('1.0.0')
    .argument('[baseUrl]', 'API 基础地址（默认 http://localhost:8000）')
    .option('--clean', '每轮下载前删除本地 CSV')
    .option('--clean-each', '守护模式下每轮之前删除本地 CSV')
    .option('-y, --yes', '删除 CSV 时不再确认')
    .option('--data-dir <path>', 'API 保存 CSV 的本地目录')
    .option('--start-hour <hour>', '起始小时 (0-23)', parseInteger)
    .option('--end-hour <hour>', '结束小时 (0-23)', parseInteger)
    .option('--wind-only', '只下载风速与风向')
    .option('--sleep <seconds>', '分块之间的等待秒数', parseNonNegativeNumber)
    .option('--daemon-min1', '守护模式：每小时第 1 分钟运行')
    .option('--log <file>', '日志同时写入该文件')
    .option('--years <count>', '向前回溯的年数', parseInteger)
    .option('--cities <list>', '逗号分隔的城市列表（默认全部）', parseList)
    .option('--lock-dir <dir>', '守护模式锁目录')
    .option('--timeout <ms>', '单个请求超时（毫秒，0 为不限制）', parseNonNegativeNumber)
    .option('--timezone <tz>', '守护模式调度所用时区')
    .option('--dry-run', '只打印分块计划，不发送请求')
    .action(async (baseUrl: string | undefined, options: DownloadCliOptions) => {
      try {
        const configManager = loadConfig();
        const config = applyDownloadFlags(configManager.getDownloadConfig(), baseUrl, options);
        assertValid(validateDownloadConfig(config), 'download');

        defaultLogger.configure({ minLevel: configManager.getLogLevel(), filePath: config.logFile });

        const driver = new BulkDownloadDriver(config, { client: createClient(config) });

        if (config.dryRun) {
          const plan = driver.plan();
          print(chalk.blue(`Span: ${formatDate(plan.span.start)} → ${formatDate(plan.span.end)}`));
          print(renderPlan(plan));
          exit(0);
          return;
        }

        if (config.daemon) {
          const daemon = new HourlyDaemon(config, {
            driver,
            lock: createLock(config.lockDir),
            scheduler: deps.scheduler,
            exitHooks: deps.exitHooks
          });
          if (!daemon.start()) {
            exit(0);
            return;
          }
          await daemon.waitUntilStopped();
          exit(0);
          return;
        }

        const report = await driver.runOnce();
        print(chalk.green(`✓ ${report.blocks.length} blocks requested, ${report.files.length} files reported`));
        const failed = report.blocks.filter(outcome => outcome.error !== undefined).length;
        if (failed > 0) {
          print(chalk.yellow(`⚠ ${failed} blocks answered with an error status`));
        }
        exit(0);
      } catch (error) {
        const err = toError(error);
        new OpsErrorHandler().handleError(err, { component: 'download', operation: 'run' });
        console.error(chalk.red('✗ Download failed:'), err.message);
        exit(1);
      }
    });

  return program;
}

if (require.main === module) {
  createDownloadProgram().parseAsync(process.argv).catch(error => {
    console.error(chalk.red('✗'), toError(error).message);
    process.exit(1);
  });
}
