/**
 * セル値パーサー
 *
 * 変換ルール:
 *   1. セルは前後空白をトリム後、両端の ' " 空白 , を除去（上流の誤クォート対策）
 *   2. epoch ミリ秒: 符号付き整数 → Date（範囲外は失敗）
 *   3. 日時文字列: 'YYYY-MM-DD HH:MM:SS[.fff]'、UTC、小数秒は任意（ms に丸め）
 *   4. duration: 整数ミリ秒 / 小数秒（×1000 して floor、inf / nan は不可）
 *   5. ber: 32bit float（inf / nan も可）
 *   6. valid: 'VALID' | 'true' | '1' → true、それ以外は全て false（失敗しない）
 *   7. status: 完全一致のみ、不明値 → null（呼び出し側でログのみ）
 *
 * 2〜5 の失敗は CellParseError（致命的）。
 */

import { CellParseError } from '../errors.js';
import { PERIOD_STATUSES, type PeriodStatus } from './types.js';

const ENCLOSING_CHARS_RE = /^['", ]+|['", ]+$/g;
const INTEGER_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const FLOAT_SPECIAL_RE = /^([+-]?)(inf|infinity|nan)$/i;
const DATETIME_RE = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?$/;

/** Date が表現できる epoch ミリ秒の上限（±100,000,000 日） */
const MAX_EPOCH_MS = 8.64e15;

const VALID_TRUE_VALUES = new Set(['VALID', 'true', '1']);

export function cleanCell(raw: string): string {
  return raw.trim().replace(ENCLOSING_CHARS_RE, '');
}

// ============================================================
// Numbers
// ============================================================

function parseInteger(value: string, column: string, reason: string): number {
  if (!INTEGER_RE.test(value)) throw new CellParseError(reason, column, value);
  const n = Number(value);
  if (!Number.isSafeInteger(n)) throw new CellParseError(`${reason} (out of range)`, column, value);
  return n === 0 ? 0 : n;
}

function parseFloatStrict(value: string, column: string, reason: string): number {
  if (FLOAT_RE.test(value)) return Number(value);

  const special = FLOAT_SPECIAL_RE.exec(value);
  if (!special) throw new CellParseError(reason, column, value);
  if (special[2].toLowerCase() === 'nan') return NaN;
  return special[1] === '-' ? -Infinity : Infinity;
}

// ============================================================
// Time
// ============================================================

export function parseEpochMillis(value: string, column: string): Date {
  const millis = parseInteger(value, column, 'could not parse timestamp as integer');
  if (Math.abs(millis) > MAX_EPOCH_MS) {
    throw new CellParseError('could not convert timestamp to datetime', column, value);
  }
  return new Date(millis);
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

export function parseDateTime(value: string, column: string): Date {
  const m = DATETIME_RE.exec(value);
  if (!m) throw new CellParseError('failed to parse datetime', column, value);

  const [year, month, day, hour, minute, second] = m.slice(1, 7).map(Number);
  if (
    month < 1 || month > 12 ||
    day < 1 || day > daysInMonth(year, month) ||
    hour > 23 || minute > 59 || second > 59
  ) {
    throw new CellParseError('failed to parse datetime', column, value);
  }

  const fraction = m[7];
  const millis = fraction ? Math.round(Number(`0.${fraction}`) * 1000) : 0;

  // Date.UTC は 0〜99 年を 1900 年代に読み替えるため setUTCFullYear を使う
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, millis);
  return date;
}

// ============================================================
// Duration (ms)
// ============================================================

export function durationFromMillis(value: string, column: string): number {
  return parseInteger(value, column, 'failed to parse millis from duration');
}

export function durationFromSeconds(value: string, column: string): number {
  const reason = 'failed to parse seconds from duration';
  if (!FLOAT_RE.test(value)) throw new CellParseError(reason, column, value);
  const millis = Math.floor(Number(value) * 1000);
  if (!Number.isSafeInteger(millis)) throw new CellParseError(`${reason} (out of range)`, column, value);
  return millis === 0 ? 0 : millis;
}

// ============================================================
// Others
// ============================================================

export function parseBer(value: string, column: string): number {
  return Math.fround(parseFloatStrict(value, column, 'failed to parse ber'));
}

export function parseValid(value: string): boolean {
  return VALID_TRUE_VALUES.has(value);
}

export function parseStatus(value: string): PeriodStatus | null {
  return PERIOD_STATUSES.find((status) => status === value) ?? null;
}
