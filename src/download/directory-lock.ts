/**
 * 基于目录的进程互斥锁
 * mkdir 非递归创建是原子操作：目录已存在即说明另一个实例持有锁
 */

import fs from 'fs';
import path from 'path';
import { OpsError, OpsErrorType, errorCode } from '../common/utils/error-handler';

export interface LockOwner {
  pid: number;
  startedAt: string;
}

export interface ExitHookTarget {
  once(event: 'exit', listener: () => void): unknown;
  on(event: NodeJS.Signals, listener: () => void): unknown;
}

const OWNER_FILE = 'owner.json';

export class DirectoryLock {
  readonly lockDir: string;
  private held = false;

  constructor(lockDir: string) {
    this.lockDir = lockDir;
  }

  get isHeld(): boolean {
    return this.held;
  }

  /**
   * 尝试获取锁，已被占用时返回 false
   */
  acquire(): boolean {
    if (this.held) {
      return true;
    }

    try {
      fs.mkdirSync(path.dirname(path.resolve(this.lockDir)), { recursive: true });
    } catch (error) {
      throw this.lockError(error);
    }

    try {
      fs.mkdirSync(this.lockDir);
    } catch (error) {
      if (errorCode(error) === 'EEXIST') {
        return false;
      }
      throw this.lockError(error);
    }

    this.held = true;
    const owner: LockOwner = { pid: process.pid, startedAt: new Date().toISOString() };
    fs.writeFileSync(path.join(this.lockDir, OWNER_FILE), JSON.stringify(owner, null, 2));
    return true;
  }

  /**
   * 读取当前持有者信息（用于冲突时的日志）
   */
  readOwner(): LockOwner | null {
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(path.join(this.lockDir, OWNER_FILE), 'utf-8'));
      if (
        typeof parsed === 'object' && parsed !== null &&
        'pid' in parsed && typeof parsed.pid === 'number' &&
        'startedAt' in parsed && typeof parsed.startedAt === 'string'
      ) {
        return { pid: parsed.pid, startedAt: parsed.startedAt };
      }
      return null;
    } catch {
      return null;
    }
  }

  release(): void {
    if (!this.held) {
      return;
    }
    fs.rmSync(this.lockDir, { recursive: true, force: true });
    this.held = false;
  }

  private lockError(error: unknown): OpsError {
    return new OpsError(
      `Cannot create lock directory ${this.lockDir}: ${error instanceof Error ? error.message : String(error)}`,
      OpsErrorType.LOCK_ERROR,
      'lock',
      'acquire'
    );
  }

  /**
   * 进程退出或收到 SIGINT/SIGTERM 时释放锁
   */
  releaseOnExit(target: ExitHookTarget = process, exit: (code: number) => void = code => process.exit(code)): void {
    target.once('exit', () => this.release());
    target.on('SIGINT', () => {
      this.release();
      exit(130);
    });
    target.on('SIGTERM', () => {
      this.release();
      exit(143);
    });
  }
}
