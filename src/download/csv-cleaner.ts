/**
 * 本地 CSV 清理
 * 删除数据目录第一层的 *.csv 文件（不递归）
 */

import fs from 'fs';
import path from 'path';
import readline from 'readline';
import { OpsLogger, createDownloadLogger } from '../common/utils/logger';
import { OpsError, OpsErrorType, toError } from '../common/utils/error-handler';

export type ConfirmFn = (question: string) => Promise<boolean>;

export interface CleanOptions {
  /** 跳过确认 */
  assumeYes: boolean;
  confirm?: ConfirmFn;
  logger?: OpsLogger;
}

export interface CleanResult {
  cancelled: boolean;
  deleted: string[];
}

/**
 * 在终端询问 y/N；非交互环境直接视为拒绝
 */
export const promptConfirm: ConfirmFn = async question => {
  if (!process.stdin.isTTY) {
    return false;
  }

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout
  });

  const answer = await new Promise<string>(resolve => {
    rl.question(`${question} [y/N] `, resolve);
  });

  rl.close();
  return isAffirmative(answer);
};

export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === 'y' || normalized === 'yes';
}

export async function cleanCsvFiles(dataDir: string, options: CleanOptions): Promise<CleanResult> {
  const logger = options.logger || createDownloadLogger('cleaner');
  const confirm = options.confirm || promptConfirm;

  logger.warn(`CSV files in ${dataDir} will be deleted`, undefined, 'clean');

  try {
    fs.mkdirSync(dataDir, { recursive: true });
  } catch (error) {
    throw new OpsError(
      `Cannot create data directory ${dataDir}: ${toError(error).message}`,
      OpsErrorType.FILESYSTEM_ERROR,
      'cleaner',
      'clean'
    );
  }

  if (!options.assumeYes) {
    const confirmed = await confirm(`Delete *.csv in ${dataDir}?`);
    if (!confirmed) {
      logger.info('Cleaning cancelled', undefined, 'clean');
      return { cancelled: true, deleted: [] };
    }
  }

  const deleted: string[] = [];
  const entries = fs.readdirSync(dataDir, { withFileTypes: true });

  for (const entry of entries) {
    if (!entry.isFile() || !entry.name.endsWith('.csv')) {
      continue;
    }
    const filePath = path.join(dataDir, entry.name);
    fs.unlinkSync(filePath);
    deleted.push(filePath);
  }

  deleted.sort();
  logger.info(`🧹 Cleaning finished in ${dataDir}`, { deleted: deleted.length }, 'clean');
  return { cancelled: false, deleted };
}
