import * as path from 'path';
import { ConfigurationError } from '../errors.js';

export type Delimiter = ',' | '\t';

const DELIMITERS: ReadonlyMap<string, Delimiter> = new Map<string, Delimiter>([
  ['.csv', ','],
  ['.tsv', '\t'],
]);

/** 拡張子のみで判定（大文字小文字区別、内容は見ない） */
export function resolveDelimiter(filePath: string): Delimiter {
  const ext = path.extname(filePath);
  const delimiter = DELIMITERS.get(ext);
  if (!delimiter) {
    throw new ConfigurationError(`unsupported file extension '${ext}': ${filePath}`);
  }
  return delimiter;
}
