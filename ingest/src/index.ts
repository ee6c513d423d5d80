/**
 * Viewing period ingest — library entry point
 *
 * CSV/TSV exports from several upstream producers → one canonical ViewingPeriod shape.
 * The executable lives in cli.ts.
 */

export {
  readViewingPeriods,
  readViewingPeriodsFromText,
  readViewingPeriodsFromBytes,
  resolveDelimiter,
  parseHeader,
  splitLines,
} from './reader/index.js';
export {
  normalizeViewingPeriod,
  normalizeLine,
  resolveColumn,
  knownColumns,
  endTime,
  offsetMs,
  formatViewingPeriod,
  toPeriodRow,
  NO_MATCH_STREAM_IDS,
  DEFAULT_USER_ID,
} from './normalizer/index.js';
export { IngestError, ConfigurationError, InputError, CellParseError } from './errors.js';
export { runCli } from './run.js';

export type { Delimiter, Header, LineResult } from './reader/index.js';
export type { ViewingPeriod, PeriodStatus, PeriodRow, FieldAction } from './normalizer/index.js';
export type { IngestConfig, OutputFormat } from './config.js';
