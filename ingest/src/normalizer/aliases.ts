/**
 * 列名エイリアス表
 *
 * 上流ごとに異なる列名を、正規化レコードへの代入アクションに写像する。
 * 完全一致・大文字小文字区別（'status' と 'Status' はどちらも登録済み、'STATUS' は未知列）。
 */

/** 列ごとの代入アクション。viewing-period.ts の switch で網羅チェックされる */
export type FieldAction =
  | 'status'
  | 'userId'
  | 'timeInFileMillis'
  | 'queryTimeMillis'
  | 'queryTimeDateTime'
  | 'durationMillis'
  | 'durationSeconds'
  | 'streamId'
  | 'provider'
  | 'entryId'
  | 'ber'
  | 'valid'
  | 'offsetMillis'
  | 'offsetSeconds'
  | 'endTimeDateTime';

const ALIAS_LOOKUP: ReadonlyMap<string, FieldAction> = new Map<string, FieldAction>([
  ['status', 'status'],
  ['Status', 'status'],

  ['userID', 'userId'],
  ['rss_id', 'userId'],
  ['DEVICE_ID', 'userId'],

  ['timeInFile', 'timeInFileMillis'],

  ['tStartMsec', 'queryTimeMillis'],
  ['tStart', 'queryTimeMillis'],

  ['startTime', 'queryTimeDateTime'],
  ['start_ts', 'queryTimeDateTime'],
  ['START', 'queryTimeDateTime'],

  ['durationMsec', 'durationMillis'],
  ['duration', 'durationSeconds'],

  ['stream_id', 'streamId'],
  ['Stream_id', 'streamId'],
  ['stream_name', 'streamId'],
  ['name', 'streamId'],
  ['STREAM_LABEL', 'streamId'],

  ['module_ref', 'provider'],

  ['period_id', 'entryId'],
  ['id', 'entryId'],

  ['bitErrorRate', 'ber'],
  ['ber', 'ber'],

  ['valid', 'valid'],

  // offset = queryTime - timeInFile
  ['offset', 'offsetMillis'],
  ['offset_s', 'offsetSeconds'],
  ['OFFSET', 'offsetSeconds'],

  ['endTime', 'endTimeDateTime'],
  ['stop_ts', 'endTimeDateTime'],
  ['END', 'endTimeDateTime'],
]);

/** 列名 → アクション。未知の列名は null */
export function resolveColumn(name: string): FieldAction | null {
  return ALIAS_LOOKUP.get(name) ?? null;
}

export function knownColumns(): string[] {
  return [...ALIAS_LOOKUP.keys()];
}
