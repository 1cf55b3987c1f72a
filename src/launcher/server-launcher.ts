/**
 * API 服务启动器
 * 准备数据目录、释放被占用的端口，然后以子进程方式启动 uvicorn
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { spawn, ChildProcess, SpawnOptions } from 'child_process';
import { LaunchConfig } from '../common/config/config-manager';
import { OpsLogger, createLauncherLogger } from '../common/utils/logger';
import { OpsError, OpsErrorType, toError } from '../common/utils/error-handler';
import { PortInspector } from './port-inspector';
import { ProcessTerminator } from './process-terminator';

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => ChildProcess;

export interface SignalSource {
  on(event: NodeJS.Signals, listener: () => void): unknown;
  off(event: NodeJS.Signals, listener: () => void): unknown;
}

export interface ServerLauncherDeps {
  inspector?: PortInspector;
  terminator?: ProcessTerminator;
  spawn?: SpawnFn;
  fileExists?: (filePath: string) => boolean;
  signals?: SignalSource;
  print?: (line: string) => void;
  logger?: OpsLogger;
}

/**
 * 终端的 SIGINT 会送达整个前台进程组，子进程已经收到，这里只需保持存活等它退出；
 * SIGTERM 只发给启动器，需要转发
 */
const SIGNAL_FORWARDING: Array<{ signal: NodeJS.Signals; forward: boolean }> = [
  { signal: 'SIGINT', forward: false },
  { signal: 'SIGTERM', forward: true }
];

/**
 * 构造服务进程参数
 */
export function buildServerArgs(config: LaunchConfig): string[] {
  const args = [
    config.appModule,
    '--host', config.host,
    '--port', String(config.port),
    '--app-dir', config.appDir
  ];
  if (config.reload) {
    args.push('--reload');
  }
  return args;
}

/**
 * 被信号终止的进程按 shell 惯例返回 128 + 信号编号
 */
export function exitCodeFor(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) {
    return code;
  }
  if (signal) {
    const signalNumber: unknown = Object.entries(os.constants.signals).find(([name]) => name === signal)?.[1];
    return typeof signalNumber === 'number' ? 128 + signalNumber : 1;
  }
  return 1;
}

export class ServerLauncher {
  private readonly config: LaunchConfig;
  private readonly inspector: PortInspector;
  private readonly terminator: ProcessTerminator;
  private readonly spawnFn: SpawnFn;
  private readonly fileExists: (filePath: string) => boolean;
  private readonly signals: SignalSource;
  private readonly print: (line: string) => void;
  private readonly logger: OpsLogger;

  constructor(config: LaunchConfig, deps: ServerLauncherDeps = {}) {
    this.config = config;
    this.logger = deps.logger || createLauncherLogger();
    this.inspector = deps.inspector || new PortInspector();
    this.terminator = deps.terminator || new ProcessTerminator({ logger: this.logger });
    this.spawnFn = deps.spawn || ((command, args, options) => spawn(command, args, options));
    this.fileExists = deps.fileExists || fs.existsSync;
    this.signals = deps.signals || process;
    this.print = deps.print || (line => console.log(line));
  }

  /**
   * 启动服务并等待其退出，返回退出码
   */
  async launch(): Promise<number> {
    this.ensureDirectories();
    await this.freePort();

    const command = this.resolveServerCommand();
    const args = buildServerArgs(this.config);
    this.printSummary(command);

    return this.runServer(command, args);
  }

  /**
   * 创建数据与状态目录
   */
  ensureDirectories(): void {
    for (const dir of [this.config.dataDir, this.config.stateDir]) {
      try {
        fs.mkdirSync(dir, { recursive: true });
      } catch (error) {
        throw new OpsError(
          `Cannot create directory ${dir}: ${toError(error).message}`,
          OpsErrorType.FILESYSTEM_ERROR,
          'launcher',
          'ensureDirectories'
        );
      }
    }
  }

  /**
   * 端口被占用时，按 --kill 决定终止占用进程还是放弃启动
   */
  async freePort(): Promise<void> {
    const { port } = this.config;

    const status = await this.inspector.checkPort(port);
    if (!status.inUse) {
      return;
    }

    this.print(`⚠️  Port ${port} is in use.`);

    if (!this.config.kill) {
      throw new OpsError(
        `Port ${port} is in use: use --kill or pick another port with -p`,
        OpsErrorType.PROCESS_ERROR,
        'launcher',
        'freePort',
        { port }
      );
    }

    const pids = status.pids;
    if (pids === null) {
      throw new OpsError(
        `Port ${port} is in use and lsof is not available to find its owner: pick another port with -p`,
        OpsErrorType.PROCESS_ERROR,
        'launcher',
        'freePort',
        { port }
      );
    }

    this.print(`🛑 Killing processes: ${pids.join(' ')}`);
    await this.terminator.terminate(pids);

    if ((await this.inspector.checkPort(port)).inUse) {
      throw new OpsError(
        `Port ${port} is still in use after terminating its listeners`,
        OpsErrorType.PROCESS_ERROR,
        'launcher',
        'freePort',
        { port, pids }
      );
    }

    this.logger.info(`Port ${port} released`, { pids }, 'freePort');
  }

  /**
   * 虚拟环境中存在同名可执行文件时优先使用
   */
  resolveServerCommand(): string {
    const { serverCommand, venvDir } = this.config;
    if (serverCommand.includes('/') || serverCommand.includes(path.sep)) {
      return serverCommand;
    }
    const venvCommand = path.join(venvDir, 'bin', serverCommand);
    return this.fileExists(venvCommand) ? venvCommand : serverCommand;
  }

  private printSummary(command: string): void {
    const c = this.config;
    this.print('🚀 Starting API:');
    this.print(`   - COMMAND    : ${command}`);
    this.print(`   - APP_MODULE : ${c.appModule}`);
    this.print(`   - APP_DIR    : ${c.appDir}`);
    this.print(`   - HOST       : ${c.host}`);
    this.print(`   - PORT       : ${c.port}`);
    this.print(`   - DATA_DIR   : ${c.dataDir}`);
    this.print(`   - STATE_DIR  : ${c.stateDir}`);
    this.print(`   - RELOAD     : ${c.reload}`);
  }

  private runServer(command: string, args: string[]): Promise<number> {
    return new Promise((resolve, reject) => {
      const child = this.spawnFn(command, args, {
        stdio: 'inherit',
        env: {
          ...process.env,
          DATA_DIR: this.config.dataDir,
          STATE_DIR: this.config.stateDir
        }
      });

      const handlers = SIGNAL_FORWARDING.map(({ signal, forward }) => {
        const handler = (): void => {
          if (!forward) {
            this.logger.info(`${signal} received, waiting for the server to exit`, { pid: child.pid }, 'runServer');
            return;
          }
          this.logger.info(`Forwarding ${signal} to server`, { pid: child.pid }, 'runServer');
          child.kill(signal);
        };
        this.signals.on(signal, handler);
        return { signal, handler };
      });

      const cleanup = (): void => {
        for (const { signal, handler } of handlers) {
          this.signals.off(signal, handler);
        }
      };

      child.once('error', error => {
        cleanup();
        reject(new OpsError(
          `Failed to start ${command}: ${error.message}`,
          OpsErrorType.PROCESS_ERROR,
          'launcher',
          'runServer',
          { command, args }
        ));
      });

      child.once('exit', (code, signal) => {
        cleanup();
        const exitCode = exitCodeFor(code, signal);
        this.logger.info(`Server exited with code ${exitCode}`, { code, signal }, 'runServer');
        resolve(exitCode);
      });
    });
  }
}
