import type { PeriodRow, ViewingPeriod } from './types.js';

export function endTime(period: ViewingPeriod): Date {
  return new Date(period.queryTime.getTime() + period.durationMs);
}

/** queryTime - timeInFile（ms） */
export function offsetMs(period: ViewingPeriod): number {
  return period.queryTime.getTime() - period.timeInFile.getTime();
}

/** 整数ミリ秒 → '[-]S.mmm'（浮動小数点を経由しない） */
export function formatSeconds(ms: number): string {
  const sign = ms < 0 ? '-' : '';
  const abs = Math.abs(ms);
  const whole = Math.floor(abs / 1000);
  const frac = String(abs % 1000).padStart(3, '0');
  return `${sign}${whole}.${frac}`;
}

/** RFC 3339、ミリ秒、'Z' 付き */
export function formatTimestamp(date: Date): string {
  return date.toISOString();
}

/**
 * 1行のテキスト表現。
 * stream_id / entry_id の値の後に区切りの ', ' が入らないのは既存フォーマットのまま。
 */
export function formatViewingPeriod(period: ViewingPeriod): string {
  return [
    `user_id: ${period.userId}, `,
    `status: ${period.status}, `,
    `stream_id: ${period.streamId ?? ''}`,
    `entry_id: ${period.entryId ?? ''}`,
    `offset_s: ${formatSeconds(offsetMs(period))}, `,
    `startTime: ${formatTimestamp(period.queryTime)}, `,
    `endTime: ${formatTimestamp(endTime(period))}, `,
    `duration: ${formatSeconds(period.durationMs)}, `,
    `ber: ${period.ber.toFixed(2)}, `,
    `valid: ${period.valid}`,
  ].join('');
}

export function toPeriodRow(period: ViewingPeriod): PeriodRow {
  return {
    provider: period.provider,
    status: period.status,
    user_id: period.userId,
    query_time: formatTimestamp(period.queryTime),
    time_in_file: formatTimestamp(period.timeInFile),
    end_time: formatTimestamp(endTime(period)),
    duration_ms: period.durationMs,
    offset_ms: offsetMs(period),
    stream_id: period.streamId,
    entry_id: period.entryId,
    ber: period.ber,
    valid: period.valid,
  };
}
