/**
 * Normalizer — reader → normalizer → sink パイプライン
 *
 * 全正規化関数と型をこのエントリポイントから re-export。
 */

export { normalizeViewingPeriod, normalizeLine, NO_MATCH_STREAM_IDS, DEFAULT_USER_ID } from './viewing-period.js';
export { resolveColumn, knownColumns } from './aliases.js';
export { endTime, offsetMs, formatViewingPeriod, toPeriodRow } from './format.js';

export type { FieldAction } from './aliases.js';
export type { ViewingPeriod, PeriodStatus, PeriodRow } from './types.js';
