#!/usr/bin/env node

/**
 * API 启动命令行工具
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { ConfigManager, LaunchConfig, assertValid, validateLaunchConfig } from '../common/config/config-manager';
import { defaultLogger } from '../common/utils/logger';
import { OpsErrorHandler, toError } from '../common/utils/error-handler';
import { parseInteger } from '../common/utils/cli-options';
import { ServerLauncher } from './server-launcher';

export interface LaunchCliOptions {
  port?: number;
  host?: string;
  kill?: boolean;
  reload: boolean;
  appModule?: string;
  appDir?: string;
}

export interface LaunchProgramDeps {
  loadConfig?: () => ConfigManager;
  createLauncher?: (config: LaunchConfig) => Pick<ServerLauncher, 'launch'>;
  exit?: (code: number) => void;
}

/**
 * 命令行参数覆盖配置（--no-reload 只能关闭重载）
 */
export function applyLaunchFlags(base: LaunchConfig, options: LaunchCliOptions): LaunchConfig {
  return {
    ...base,
    port: options.port ?? base.port,
    host: options.host ?? base.host,
    kill: options.kill ?? base.kill,
    reload: options.reload === false ? false : base.reload,
    appModule: options.appModule ?? base.appModule,
    appDir: options.appDir ?? base.appDir
  };
}

export function createLaunchProgram(deps: LaunchProgramDeps = {}): Command {
  const loadConfig = deps.loadConfig || (() => new ConfigManager());
  const createLauncher = deps.createLauncher || ((config: LaunchConfig) => new ServerLauncher(config));
  const exit = deps.exit || ((code: number) => process.exit(code));

  const program = new Command();

  program
    .name('run-api')
    .description('启动历史气象数据 API 服务（uvicorn）')
    .version('1.0.0')
    .option('-p, --port <port>', '监听端口', parseInteger)
    .option('-H, --host <host>', '监听地址')
    .option('--kill', '端口被占用时终止占用进程')
    .option('--no-reload', '关闭自动重载')
    .option('--app-module <module>', 'ASGI 应用模块')
    .option('--app-dir <dir>', '应用包根目录')
    .action(async (options: LaunchCliOptions) => {
      try {
        const configManager = loadConfig();
        defaultLogger.configure({ minLevel: configManager.getLogLevel() });

        const config = applyLaunchFlags(configManager.getLaunchConfig(), options);
        assertValid(validateLaunchConfig(config), 'launcher');

        const exitCode = await createLauncher(config).launch();
        exit(exitCode);
      } catch (error) {
        const err = toError(error);
        new OpsErrorHandler().handleError(err, { component: 'launcher', operation: 'launch' });
        console.error(chalk.red('❌'), err.message);
        exit(1);
      }
    });

  return program;
}

if (require.main === module) {
  createLaunchProgram().parseAsync(process.argv).catch(error => {
    console.error(chalk.red('❌'), toError(error).message);
    process.exit(1);
  });
}
