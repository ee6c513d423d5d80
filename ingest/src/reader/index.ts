/**
 * Viewing period reader
 *
 * path → delimiter → bytes → header + lines → ViewingPeriod[]
 *
 * Every data line is one record, blank lines included (a blank line is a
 * single empty cell under the first column). Unreadable data lines are logged
 * and skipped. A malformed time, duration or ber cell throws and the whole
 * read is abandoned: no partial result.
 */

import * as fs from 'fs';
import { InputError } from '../errors.js';
import { normalizeLine } from '../normalizer/index.js';
import type { ViewingPeriod } from '../normalizer/index.js';
import { createLogger } from '../utils/logger.js';
import { resolveDelimiter, type Delimiter } from './delimiter.js';
import { parseHeader } from './header.js';
import { splitLines } from './lines.js';

const log = createLogger('reader');

export function readViewingPeriods(filePath: string): ViewingPeriod[] {
  const delimiter = resolveDelimiter(filePath);

  let bytes: Buffer;
  try {
    bytes = fs.readFileSync(filePath);
  } catch (err) {
    throw new InputError(`failed to open file: ${filePath}`, err);
  }

  log.debug(`Read ${bytes.length} bytes from ${filePath}`);
  return readViewingPeriodsFromBytes(bytes, delimiter);
}

export function readViewingPeriodsFromText(text: string, delimiter: Delimiter): ViewingPeriod[] {
  return readViewingPeriodsFromBytes(new TextEncoder().encode(text), delimiter);
}

export function readViewingPeriodsFromBytes(bytes: Uint8Array, delimiter: Delimiter): ViewingPeriod[] {
  const lines = splitLines(bytes);

  const first = lines.next();
  if (first.done) {
    throw new InputError('expected table to have at least header');
  }
  if (!first.value.ok) {
    throw new InputError('failed to read header from file', first.value.error);
  }
  const header = parseHeader(first.value.line, delimiter);

  const periods: ViewingPeriod[] = [];
  for (const result of lines) {
    if (!result.ok) {
      log.warn(`failed to read period line ${result.lineNumber}`, result.error);
      continue;
    }
    periods.push(normalizeLine(header, result.line, delimiter));
  }

  return periods;
}

export { resolveDelimiter, parseHeader, splitLines };
export type { Delimiter };
export type { Header } from './header.js';
export type { LineResult } from './lines.js';
