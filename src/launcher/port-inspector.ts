/**
 * 端口占用检测
 * 优先用 lsof 查找监听进程，lsof 不可用时通过 TCP 连接探测
 */

import net from 'net';
import { execFile } from 'child_process';
import { errorCode } from '../common/utils/error-handler';

export type CommandRunner = (command: string, args: string[]) => Promise<string>;

export interface PortInspectorOptions {
  /** 探测主机 */
  probeHost?: string;

  /** 探测超时（毫秒） */
  probeTimeout?: number;

  /** 外部命令执行器 */
  runCommand?: CommandRunner;
}

/**
 * 执行外部命令并返回标准输出
 */
export const execCommand: CommandRunner = (command, args) => {
  return new Promise((resolve, reject) => {
    execFile(command, args, (error, stdout) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(stdout);
    });
  });
};

export interface PortStatus {
  inUse: boolean;

  /** 监听进程；lsof 不可用时为 null */
  pids: number[] | null;
}

export class PortInspector {
  private readonly probeHost: string;
  private readonly probeTimeout: number;
  private readonly runCommand: CommandRunner;

  constructor(options: PortInspectorOptions = {}) {
    this.probeHost = options.probeHost || '127.0.0.1';
    this.probeTimeout = options.probeTimeout ?? 1000;
    this.runCommand = options.runCommand || execCommand;
  }

  /**
   * 端口占用状态：lsof 可用时以其结果为准（包括只监听 IPv6 或其他网卡的进程），
   * 否则退回到 TCP 探测
   */
  async checkPort(port: number): Promise<PortStatus> {
    const pids = await this.findListeningPids(port);
    if (pids !== null) {
      return { inUse: pids.length > 0, pids };
    }
    return { inUse: await this.isPortInUse(port), pids: null };
  }

  /**
   * 127.0.0.1 上是否有进程接受连接
   */
  isPortInUse(port: number): Promise<boolean> {
    return new Promise(resolve => {
      const socket = net.createConnection({ host: this.probeHost, port });
      let settled = false;

      const finish = (inUse: boolean): void => {
        if (settled) {
          return;
        }
        settled = true;
        socket.destroy();
        resolve(inUse);
      };

      socket.setTimeout(this.probeTimeout);
      socket.once('connect', () => finish(true));
      socket.once('timeout', () => finish(false));
      socket.once('error', () => finish(false));
    });
  }

  /**
   * 查找监听该端口的进程 PID；lsof 不可用时返回 null
   */
  async findListeningPids(port: number): Promise<number[] | null> {
    try {
      const output = await this.runCommand('lsof', ['-t', `-iTCP:${port}`, '-sTCP:LISTEN', '-nP']);
      return parsePidList(output);
    } catch (error) {
      const code = errorCode(error);
      if (code === 'ENOENT') {
        return null;
      }
      // lsof 在没有匹配进程时以退出码 1 结束
      if (code === 1) {
        return [];
      }
      throw error;
    }
  }
}

/**
 * 解析 lsof -t 输出（每行一个 PID，去重）
 */
export function parsePidList(output: string): number[] {
  const pids = output
    .split(/\s+/)
    .map(token => token.trim())
    .filter(token => /^\d+$/.test(token))
    .map(token => parseInt(token, 10));
  return Array.from(new Set(pids));
}
