export class IngestError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'IngestError';
  }
}

/** 拡張子・環境変数など、入力を読む前に判明する設定ミス */
export class ConfigurationError extends IngestError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** ファイルを開けない / ヘッダー行が無い */
export class InputError extends IngestError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'InputError';
  }
}

/**
 * タイムスタンプ・duration・ber セルの値が壊れている。
 * 行スキップはせず、読み込み全体を中断する。
 */
export class CellParseError extends IngestError {
  constructor(
    reason: string,
    public readonly column: string,
    public readonly value: string,
  ) {
    super(`${reason}: column '${column}', value '${value}'`);
    this.name = 'CellParseError';
  }
}
