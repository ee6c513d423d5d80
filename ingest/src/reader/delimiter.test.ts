import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../errors.js';
import { resolveDelimiter } from './delimiter.js';

describe('resolveDelimiter', () => {
  it('.csv → カンマ', () => {
    expect(resolveDelimiter('periods.csv')).toBe(',');
    expect(resolveDelimiter('/data/2023-01/periods.csv')).toBe(',');
  });

  it('.tsv → タブ', () => {
    expect(resolveDelimiter('exports/periods.tsv')).toBe('\t');
  });

  it.each(['periods.txt', 'periods.CSV', 'periods.csv.gz', 'periods', 'csv', '.csv', 'periods.'])(
    '"%s" は ConfigurationError',
    (filePath) => {
      expect(() => resolveDelimiter(filePath)).toThrow(ConfigurationError);
    },
  );

  it('エラーメッセージに拡張子とパスが含まれる', () => {
    expect(() => resolveDelimiter('periods.txt')).toThrow("unsupported file extension '.txt': periods.txt");
  });
});
