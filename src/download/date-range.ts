/**
 * 日期区间计算与按年分块
 */

import { wallClock } from '../common/utils/time';

export interface CalendarDate {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
}

/** 闭区间 */
export interface DateSpan {
  start: CalendarDate;
  end: CalendarDate;
}

/** 不跨年的闭区间 */
export type YearBlock = DateSpan;

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function formatDate(date: CalendarDate): string {
  const y = String(date.year).padStart(4, '0');
  const m = String(date.month).padStart(2, '0');
  const d = String(date.day).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

export function parseDate(value: string): CalendarDate {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) {
    throw new Error(`Invalid date (expected YYYY-MM-DD): ${value}`);
  }
  const date = { year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) };
  if (date.month < 1 || date.month > 12 || date.day < 1 || date.day > daysInMonth(date.year, date.month)) {
    throw new Error(`Invalid calendar date: ${value}`);
  }
  return date;
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  return (a.year - b.year) || (a.month - b.month) || (a.day - b.day);
}

/**
 * 加减天数（按 UTC 日历计算，不受夏令时影响）
 */
export function addDays(date: CalendarDate, days: number): CalendarDate {
  const shifted = new Date(Date.UTC(date.year, date.month - 1, date.day + days));
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate()
  };
}

/**
 * 同月同日减去若干年；目标年份没有 2 月 29 日时取 2 月 28 日
 */
export function subtractYears(date: CalendarDate, years: number): CalendarDate {
  const year = date.year - years;
  return {
    year,
    month: date.month,
    day: Math.min(date.day, daysInMonth(year, date.month))
  };
}

/**
 * 参考时刻在指定时区（默认进程本地时区）下的日期
 */
export function toLocalDate(reference: Date, timeZone?: string): CalendarDate {
  const { year, month, day } = wallClock(reference, timeZone);
  return { year, month, day };
}

/**
 * 以参考时刻的前一天为终点、向前 yearsBack 年的区间
 */
export function computeSpan(reference: Date, yearsBack = 10, timeZone?: string): DateSpan {
  if (!Number.isInteger(yearsBack) || yearsBack < 1) {
    throw new Error(`yearsBack must be a positive integer, got ${yearsBack}`);
  }
  const end = addDays(toLocalDate(reference, timeZone), -1);
  return { start: subtractYears(end, yearsBack), end };
}

/**
 * 将区间切分为按自然年对齐的请求块：
 * 首块从起点到当年 12-31，中间为完整年份，末块从终点年份 01-01 到终点
 */
export function partitionIntoYearBlocks(span: DateSpan): YearBlock[] {
  const { start, end } = span;

  if (compareDates(start, end) > 0) {
    throw new Error(`Span start ${formatDate(start)} is after its end ${formatDate(end)}`);
  }

  if (start.year === end.year) {
    return [{ start, end }];
  }

  const blocks: YearBlock[] = [
    { start, end: { year: start.year, month: 12, day: 31 } }
  ];

  for (let year = start.year + 1; year < end.year; year++) {
    blocks.push({
      start: { year, month: 1, day: 1 },
      end: { year, month: 12, day: 31 }
    });
  }

  blocks.push({ start: { year: end.year, month: 1, day: 1 }, end });

  return blocks;
}

export function describeBlock(block: YearBlock): string {
  return `${formatDate(block.start)} → ${formatDate(block.end)}`;
}
