import { describe, it, expect } from 'vitest';
import { CellParseError } from '../errors.js';
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

// ============================================================
// セル値パーサー — Unit Tests
// ============================================================

describe('cleanCell', () => {
  it('前後の空白をトリムする', () => {
    expect(cleanCell('  169808 \t')).toBe('169808');
  });

  it('両端のクォートとカンマを除去する', () => {
    expect(cleanCell('  "abc",  ')).toBe('abc');
    expect(cleanCell("'329'")).toBe('329');
    expect(cleanCell(', ,5, ')).toBe('5');
  });

  it('内側の文字は残す', () => {
    expect(cleanCell('a"b, c')).toBe('a"b, c');
  });

  it('除去対象だけのセルは空文字になる', () => {
    expect(cleanCell(`"',`)).toBe('');
  });
});

describe('parseEpochMillis', () => {
  it('epoch ミリ秒を UTC の Date に変換する', () => {
    expect(parseEpochMillis('1673531400000', 'tStart')).toEqual(new Date(Date.UTC(2023, 0, 12, 13, 50, 0)));
  });

  it.each(['0', '-1', '1672617736352', '8640000000000000'])('%s は getTime() で元に戻る', (millis) => {
    expect(parseEpochMillis(millis, 'tStart').getTime()).toBe(Number(millis));
  });

  it('先頭の + を受け付ける', () => {
    expect(parseEpochMillis('+1000', 'tStart').getTime()).toBe(1000);
  });

  it.each(['abc', '', '12.5', '1e3', '0x10'])('整数でない "%s" は CellParseError', (value) => {
    expect(() => parseEpochMillis(value, 'tStartMsec')).toThrow(CellParseError);
  });

  it('エラーに列名と値が含まれる', () => {
    expect(() => parseEpochMillis('abc', 'tStartMsec')).toThrow(
      "could not parse timestamp as integer: column 'tStartMsec', value 'abc'",
    );
  });

  it('Date の範囲外は変換失敗', () => {
    expect(() => parseEpochMillis('8640000000000001', 'timeInFile')).toThrow(
      "could not convert timestamp to datetime: column 'timeInFile', value '8640000000000001'",
    );
  });

  it('64bit を超える桁数は範囲外', () => {
    expect(() => parseEpochMillis('99999999999999999999', 'tStart')).toThrow(
      'could not parse timestamp as integer (out of range)',
    );
  });
});

describe('parseDateTime', () => {
  it('ミリ秒付きの日時を UTC として解釈する', () => {
    expect(parseDateTime('2023-01-12 13:50:00.123', 'startTime').getTime()).toBe(
      Date.UTC(2023, 0, 12, 13, 50, 0, 123),
    );
  });

  it('小数秒は省略できる', () => {
    expect(parseDateTime('2023-01-12 13:50:00', 'START').getTime()).toBe(Date.UTC(2023, 0, 12, 13, 50, 0));
  });

  it('1〜2桁の小数秒はミリ秒に換算される', () => {
    expect(parseDateTime('2023-01-12 14:00:05.5', 'END').getUTCMilliseconds()).toBe(500);
    expect(parseDateTime('2023-01-12 14:00:05.07', 'END').getUTCMilliseconds()).toBe(70);
  });

  it('4桁以上の小数秒はミリ秒に丸められる', () => {
    expect(parseDateTime('2023-01-12 13:50:00.1234', 'START').getUTCMilliseconds()).toBe(123);
    expect(parseDateTime('2023-01-12 13:50:00.12351', 'START').getUTCMilliseconds()).toBe(124);
  });

  it('丸めで 1000ms になる場合は次の秒に繰り上がる', () => {
    expect(parseDateTime('2023-01-12 13:50:00.9996', 'START').getTime()).toBe(Date.UTC(2023, 0, 12, 13, 50, 1, 0));
  });

  it('うるう年の 2/29 を受け付ける', () => {
    expect(parseDateTime('2024-02-29 00:00:00', 'START').getTime()).toBe(Date.UTC(2024, 1, 29));
  });

  it.each([
    '2023-01-12T13:50:00',
    '2023-01-12 13:50',
    '2023-01-12 13:50:00.',
    '2023-02-30 00:00:00',
    '2023-02-29 00:00:00',
    '2023-13-01 00:00:00',
    '2023-01-12 24:00:00',
    '2023-01-12 13:60:00',
    '1673531400000',
    '',
  ])('書式外の "%s" は CellParseError', (value) => {
    expect(() => parseDateTime(value, 'startTime')).toThrow(CellParseError);
  });
});

describe('durationFromMillis', () => {
  it('符号付き整数ミリ秒', () => {
    expect(durationFromMillis('12928', 'durationMsec')).toBe(12928);
    expect(durationFromMillis('-250', 'offset')).toBe(-250);
  });

  it('小数は CellParseError', () => {
    expect(() => durationFromMillis('1.5', 'durationMsec')).toThrow(
      "failed to parse millis from duration: column 'durationMsec', value '1.5'",
    );
  });
});

describe('durationFromSeconds', () => {
  it('秒 × 1000 をミリ秒にする', () => {
    expect(durationFromSeconds('1.5', 'duration')).toBe(1500);
    expect(durationFromSeconds('2', 'duration')).toBe(2000);
    expect(durationFromSeconds('1e1', 'duration')).toBe(10000);
  });

  it('端数は負の無限大方向に切り捨てる', () => {
    expect(durationFromSeconds('12.9284', 'duration')).toBe(12928);
    expect(durationFromSeconds('-0.0015', 'offset_s')).toBe(-2);
  });

  it('数値でなければ CellParseError', () => {
    expect(() => durationFromSeconds('abc', 'duration')).toThrow(
      "failed to parse seconds from duration: column 'duration', value 'abc'",
    );
  });

  it('inf / nan は秒数として受け付けない', () => {
    expect(() => durationFromSeconds('inf', 'OFFSET')).toThrow(
      "failed to parse seconds from duration: column 'OFFSET', value 'inf'",
    );
    expect(() => durationFromSeconds('NaN', 'OFFSET')).toThrow(
      "failed to parse seconds from duration: column 'OFFSET', value 'NaN'",
    );
  });

  it('有限でも ms が安全な整数を超えれば範囲外', () => {
    expect(() => durationFromSeconds('1e300', 'duration')).toThrow(
      "failed to parse seconds from duration (out of range): column 'duration', value '1e300'",
    );
  });
});

describe('parseBer', () => {
  it('32bit float に丸める', () => {
    const ber = parseBer('0.247597', 'bitErrorRate');
    expect(ber).toBe(Math.fround(0.247597));
    expect(ber).toBeCloseTo(0.247597, 6);
  });

  it('inf / nan を受け付ける', () => {
    expect(parseBer('-inf', 'ber')).toBe(-Infinity);
    expect(parseBer('NaN', 'ber')).toBeNaN();
  });

  it('数値でなければ CellParseError', () => {
    expect(() => parseBer('high', 'ber')).toThrow("failed to parse ber: column 'ber', value 'high'");
    expect(() => parseBer('', 'ber')).toThrow(CellParseError);
  });
});

describe('parseValid', () => {
  it.each(['VALID', 'true', '1'])('"%s" は true', (value) => {
    expect(parseValid(value)).toBe(true);
  });

  it.each(['valid', 'TRUE', '0', '', 'yes', 'false'])('"%s" は false', (value) => {
    expect(parseValid(value)).toBe(false);
  });
});

describe('parseStatus', () => {
  it.each(['MATCH', 'NO_MATCH', 'NO_DATA', 'NO_SOUND'] as const)('%s を受け付ける', (value) => {
    expect(parseStatus(value)).toBe(value);
  });

  it.each(['match', 'Match', '0', '1', ''])('不明値 "%s" は null', (value) => {
    expect(parseStatus(value)).toBeNull();
  });
});
