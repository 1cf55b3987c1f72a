/**
 * 命令行参数解析器（供 commander 的 argParser 使用）
 */

import { InvalidArgumentError } from 'commander';

export function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError(`Not an integer: ${value}`);
  }
  return parseInt(value, 10);
}

export function parseNonNegativeNumber(value: string): number {
  const num = Number(value);
  if (value.trim() === '' || !Number.isFinite(num) || num < 0) {
    throw new InvalidArgumentError(`Not a non-negative number: ${value}`);
  }
  return num;
}

/**
 * 逗号分隔列表，空列表返回 null
 */
export function parseList(value: string): string[] | null {
  const items = value.split(',').map(item => item.trim()).filter(item => item.length > 0);
  return items.length > 0 ? items : null;
}
