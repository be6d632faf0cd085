import { InvalidDateError } from './errors';
import type { DateKey } from './types';

const DAY_MS = 86_400_000;
const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const COMPACT_PATTERN = /^(\d{4})(\d{2})(\d{2})$/;

const pad = (n: number, len = 2): string => String(n).padStart(len, '0');

const toUtcMs = (year: number, month: number, day: number): number | undefined => {
  // Date.UTC reads years 0-99 as 1900-1999
  const back = new Date(0);
  back.setUTCFullYear(year, month - 1, day);
  const ms = back.getTime();
  if (back.getUTCFullYear() !== year || back.getUTCMonth() !== month - 1 || back.getUTCDate() !== day) {
    return undefined;
  }
  return ms;
};

const fromUtcMs = (ms: number): DateKey => {
  const d = new Date(ms);
  return `${pad(d.getUTCFullYear(), 4)}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}`;
};

const keyToUtcMs = (key: DateKey): number => {
  const match = DATE_KEY_PATTERN.exec(key);
  if (!match) throw new InvalidDateError(key);
  const ms = toUtcMs(Number(match[1]), Number(match[2]), Number(match[3]));
  if (ms === undefined) throw new InvalidDateError(key);
  return ms;
};

export const isDateKey = (value: string): boolean => {
  const match = DATE_KEY_PATTERN.exec(value);
  if (!match) return false;
  return toUtcMs(Number(match[1]), Number(match[2]), Number(match[3])) !== undefined;
};

export const parseDateKey = (value: string): DateKey => {
  const trimmed = value.trim();
  if (!isDateKey(trimmed)) throw new InvalidDateError(value);
  return trimmed;
};

/** Local calendar day of `date` */
export const formatDateKey = (date: Date): DateKey =>
  `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;

/**
 * Calendar day before `now` in local time. Crossing a DST change still lands on the previous day.
 */
export const yesterday = (now: Date): DateKey =>
  formatDateKey(new Date(now.getFullYear(), now.getMonth(), now.getDate() - 1));

export const addDays = (key: DateKey, days: number): DateKey => fromUtcMs(keyToUtcMs(key) + days * DAY_MS);

/** Whole days from `start` to `end`; negative when `end` is earlier */
export const daysBetween = (start: DateKey, end: DateKey): number =>
  Math.round((keyToUtcMs(end) - keyToUtcMs(start)) / DAY_MS);

/**
 * Every day in `[start, end]`, oldest first. Empty when `start > end`.
 */
export const enumerateDays = (start: DateKey, end: DateKey): DateKey[] => {
  const count = daysBetween(start, end) + 1;
  if (count <= 0) return [];
  return Array.from({ length: count }, (_, i) => addDays(start, i));
};

/** `2024-01-15` -> `20240115` */
export const toCompactDate = (key: DateKey): string => key.replace(/-/g, '');

/** `20240115` -> `2024-01-15`, or undefined when not a calendar date */
export const fromCompactDate = (compact: string): DateKey | undefined => {
  const match = COMPACT_PATTERN.exec(compact);
  if (!match) return undefined;
  const key = `${match[1]}-${match[2]}-${match[3]}`;
  return isDateKey(key) ? key : undefined;
};

export const partitionParts = (key: DateKey): { year: string; month: string; day: string } => {
  keyToUtcMs(key);
  const [year, month, day] = key.split('-');
  return { year, month, day };
};
