/**
 * Normalizer — 入出力型定義
 *
 * reader → normalizer → sink の3段パイプラインで使用。
 * PeriodDraft = 行の畳み込み中（可変）、ViewingPeriod = 正規化済み（不変）。
 */

// ============================================================
// Status
// ============================================================

export const PERIOD_STATUSES = ['MATCH', 'NO_MATCH', 'NO_DATA', 'NO_SOUND'] as const;

/** マッチング試行の結果 */
export type PeriodStatus = (typeof PERIOD_STATUSES)[number];

// ============================================================
// ViewingPeriod
// ============================================================

/** 1行 = 1視聴区間。endTime / offset は保持せず format.ts で計算する */
export interface ViewingPeriod {
  readonly provider: string | null;
  readonly status: PeriodStatus;
  /** 未指定時は '0' */
  readonly userId: string;
  /** クエリ発行時刻（区間の開始） */
  readonly queryTime: Date;
  /** 録音ファイル内で queryTime に対応する時刻 */
  readonly timeInFile: Date;
  /** 符号付き、ミリ秒 */
  readonly durationMs: number;
  readonly streamId: string | null;
  readonly entryId: string | null;
  /** 32bit float に丸めた bit error rate */
  readonly ber: number;
  readonly valid: boolean;
}

/** 行の畳み込み中の可変アキュムレータ */
export interface PeriodDraft {
  provider: string | null;
  status: PeriodStatus;
  userId: string;
  /** この行でまだ設定されていなければ undefined */
  queryTime: Date | undefined;
  timeInFile: Date;
  durationMs: number;
  streamId: string | null;
  entryId: string | null;
  ber: number;
  valid: boolean;
  /** offset / offset_s 列の値（ms）。queryTime が揃った時点で timeInFile に反映 */
  pendingOffsetMs: number | undefined;
  /** endTime / stop_ts / END 列の値。queryTime が揃った時点で durationMs に反映 */
  pendingEndTime: Date | undefined;
}

// ============================================================
// JSON row
// ============================================================

/** CLI の JSON 出力（1行1オブジェクト） */
export interface PeriodRow {
  provider: string | null;
  status: PeriodStatus;
  user_id: string;
  query_time: string;
  time_in_file: string;
  end_time: string;
  duration_ms: number;
  offset_ms: number;
  stream_id: string | null;
  entry_id: string | null;
  ber: number;
  valid: boolean;
}
