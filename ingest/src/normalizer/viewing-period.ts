/**
 * normalizeViewingPeriod — ヘッダー + 1行 → ViewingPeriod
 *
 * ヘッダー列名とセル値をヘッダー順に zip し（短い方で打ち切り）、
 * 列ごとに代入 → 導出ルールを毎回再評価する左畳み込み。
 *
 * 導出ルール（各列の処理後に毎回、この順で）:
 *   1. offset 保留中 かつ この行で queryTime 設定済み → timeInFile = queryTime - offset
 *   2. endTime 保留中 かつ この行で queryTime 設定済み → durationMs = endTime - queryTime
 *   3. streamId が空でも番兵値でもない → status = 'MATCH'
 *
 * 注意: 導出は最終パスではなく列ごとに走る（status 列自身の処理直後も含む）。
 *   - streamId が有効なら、status 列が前後どちらにあっても結果は 'MATCH'
 *   - offset / endTime 列が queryTime 列より前にあれば、queryTime 列の処理時に初めて反映される
 *   - queryTime 列が2つあれば、後の列の値で再計算される
 * この列順依存は既存の出力と一致させること（最終パス方式にしない）。
 */

import { CellParseError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { resolveColumn, type FieldAction } from './aliases.js';
import type { PeriodDraft, ViewingPeriod } from './types.js';
import {
  cleanCell,
  parseEpochMillis,
  parseDateTime,
  durationFromMillis,
  durationFromSeconds,
  parseBer,
  parseValid,
  parseStatus,
} from './values.js';

const log = createLogger('normalizer');

/** streamId がこれらの値ならマッチとみなさない */
export const NO_MATCH_STREAM_IDS: ReadonlySet<string> = new Set(['', '0', 'NO_DATA', 'NO_MATCH', 'NO_SOUND']);

export const DEFAULT_USER_ID = '0';

function createDraft(): PeriodDraft {
  return {
    provider: null,
    status: 'NO_MATCH',
    userId: DEFAULT_USER_ID,
    queryTime: undefined,
    timeInFile: new Date(0),
    durationMs: 0,
    streamId: null,
    entryId: null,
    ber: 0,
    valid: false,
    pendingOffsetMs: undefined,
    pendingEndTime: undefined,
  };
}

function applyCell(draft: PeriodDraft, action: FieldAction, column: string, value: string): void {
  switch (action) {
    case 'status': {
      const status = parseStatus(value);
      if (status) {
        draft.status = status;
      } else {
        log.warn(`failed to parse status '${value}'`);
      }
      return;
    }
    case 'userId':
      draft.userId = value;
      return;
    case 'timeInFileMillis':
      draft.timeInFile = parseEpochMillis(value, column);
      return;
    case 'queryTimeMillis':
      draft.queryTime = parseEpochMillis(value, column);
      return;
    case 'queryTimeDateTime':
      draft.queryTime = parseDateTime(value, column);
      return;
    case 'durationMillis':
      draft.durationMs = durationFromMillis(value, column);
      return;
    case 'durationSeconds':
      draft.durationMs = durationFromSeconds(value, column);
      return;
    case 'streamId':
      draft.streamId = value;
      return;
    case 'provider':
      draft.provider = value;
      return;
    case 'entryId':
      draft.entryId = value;
      return;
    case 'ber':
      draft.ber = parseBer(value, column);
      return;
    case 'valid':
      draft.valid = parseValid(value);
      return;
    case 'offsetMillis':
      draft.pendingOffsetMs = durationFromMillis(value, column);
      return;
    case 'offsetSeconds':
      draft.pendingOffsetMs = durationFromSeconds(value, column);
      return;
    case 'endTimeDateTime':
      draft.pendingEndTime = parseDateTime(value, column);
      return;
    default: {
      const unreachable: never = action;
      throw new Error(`unhandled field action: ${String(unreachable)}`);
    }
  }
}

/** 導出した timeInFile が Date の範囲を外れたら、直前に処理した列のエラーとする */
function applyDerivations(draft: PeriodDraft, column: string, value: string): void {
  const { queryTime } = draft;

  if (draft.pendingOffsetMs !== undefined && queryTime) {
    const timeInFile = new Date(queryTime.getTime() - draft.pendingOffsetMs);
    if (Number.isNaN(timeInFile.getTime())) {
      throw new CellParseError('derived time in file out of range', column, value);
    }
    draft.timeInFile = timeInFile;
  }
  if (draft.pendingEndTime && queryTime) {
    draft.durationMs = draft.pendingEndTime.getTime() - queryTime.getTime();
  }
  if (draft.streamId !== null && !NO_MATCH_STREAM_IDS.has(draft.streamId)) {
    draft.status = 'MATCH';
  }
}

function finalize(draft: PeriodDraft): ViewingPeriod {
  return Object.freeze({
    provider: draft.provider,
    status: draft.status,
    userId: draft.userId,
    queryTime: draft.queryTime ?? new Date(0),
    timeInFile: draft.timeInFile,
    durationMs: draft.durationMs,
    streamId: draft.streamId,
    entryId: draft.entryId,
    ber: draft.ber,
    valid: draft.valid,
  });
}

/**
 * 分割済みの1行を正規化する。
 *
 * @param header ヘッダー列名（トリムなし、エイリアス表と完全一致で照合）
 * @param values 同じ区切り文字で分割したセル値
 * @throws CellParseError タイムスタンプ / duration / ber のセルが不正な場合、
 *   または導出した timeInFile が Date の範囲外になった場合
 */
export function normalizeViewingPeriod(header: readonly string[], values: readonly string[]): ViewingPeriod {
  const draft = createDraft();
  const width = Math.min(header.length, values.length);

  for (let i = 0; i < width; i++) {
    const column = header[i];
    const action = resolveColumn(column);
    const value = cleanCell(values[i]);

    if (action) {
      applyCell(draft, action, column, value);
    } else {
      log.warn(`unrecognised field key ${column}`);
    }

    applyDerivations(draft, column, value);
  }

  return finalize(draft);
}

/** 未分割の行を区切り文字で分割して正規化する */
export function normalizeLine(header: readonly string[], line: string, delimiter: string): ViewingPeriod {
  return normalizeViewingPeriod(header, line.split(delimiter));
}
