/**
 * 进程终止：SIGINT → SIGTERM → SIGKILL 逐级升级
 */

import { OpsLogger, createLauncherLogger } from '../common/utils/logger';
import { errorCode } from '../common/utils/error-handler';
import { SleepFn, sleep } from '../common/utils/time';

export type KillFn = (pid: number, signal: NodeJS.Signals) => void;

export const ESCALATION_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGKILL'];

export interface ProcessTerminatorOptions {
  /** 每个信号之后的等待时间（毫秒） */
  stepDelay?: number;
  kill?: KillFn;
  sleep?: SleepFn;
  logger?: OpsLogger;
}

export interface TerminationReport {
  /** 每个信号实际送达的 PID */
  delivered: Record<string, number[]>;

  /** 发送 SIGINT 前已不存在的 PID */
  missing: number[];
}

export class ProcessTerminator {
  private readonly stepDelay: number;
  private readonly kill: KillFn;
  private readonly sleep: SleepFn;
  private readonly logger: OpsLogger;

  constructor(options: ProcessTerminatorOptions = {}) {
    this.stepDelay = options.stepDelay ?? 1000;
    this.kill = options.kill || ((pid, signal) => {
      process.kill(pid, signal);
    });
    this.sleep = options.sleep || sleep;
    this.logger = options.logger || createLauncherLogger();
  }

  /**
   * 对所有 PID 依次发送升级信号，每一步后固定等待；进程已退出不算错误
   */
  async terminate(pids: number[]): Promise<TerminationReport> {
    const report: TerminationReport = { delivered: {}, missing: [] };
    const alive = new Set(pids);

    for (const signal of ESCALATION_SIGNALS) {
      report.delivered[signal] = [];

      for (const pid of Array.from(alive)) {
        try {
          this.kill(pid, signal);
          report.delivered[signal].push(pid);
        } catch (error) {
          const code = errorCode(error);
          if (code === 'ESRCH') {
            alive.delete(pid);
            if (signal === ESCALATION_SIGNALS[0]) {
              report.missing.push(pid);
            }
            continue;
          }
          this.logger.warn(`Could not send ${signal} to ${pid}`, { code }, 'terminate');
        }
      }

      await this.sleep(this.stepDelay);
    }

    return report;
  }
}
