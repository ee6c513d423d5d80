import type { IngestConfig, OutputFormat } from './config.js';
import { IngestError } from './errors.js';
import { formatViewingPeriod, toPeriodRow, type ViewingPeriod } from './normalizer/index.js';
import { readViewingPeriods } from './reader/index.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('cli');

export const USAGE = 'Usage: viewing-periods [--json] <file.csv|file.tsv> [...]';

interface CliArgs {
  outputFormat: OutputFormat;
  files: string[];
}

function parseArgs(args: readonly string[], defaultFormat: OutputFormat): CliArgs {
  let outputFormat = defaultFormat;
  const files: string[] = [];

  for (const arg of args) {
    if (arg === '--json') {
      outputFormat = 'json';
    } else if (arg === '--text') {
      outputFormat = 'text';
    } else {
      files.push(arg);
    }
  }
  return { outputFormat, files };
}

function render(period: ViewingPeriod, format: OutputFormat): string {
  return format === 'json' ? JSON.stringify(toPeriodRow(period)) : formatViewingPeriod(period);
}

/**
 * ファイルを引数順に読み、1レコード1行で write に渡す。
 * 最初の致命的エラーで中断し、終了コード 1 を返す。
 */
export function runCli(
  args: readonly string[],
  config: IngestConfig,
  write: (line: string) => void,
): number {
  const { outputFormat, files } = parseArgs(args, config.outputFormat);

  if (files.length === 0) {
    log.error(USAGE);
    return 1;
  }

  for (const file of files) {
    let periods: ViewingPeriod[];
    try {
      periods = readViewingPeriods(file);
    } catch (err) {
      if (err instanceof IngestError) {
        log.error(`${err.name}: ${err.message}`);
        return 1;
      }
      throw err;
    }

    for (const period of periods) {
      write(render(period, outputFormat));
    }
    log.info(`Read ${periods.length} viewing periods from ${file}`);
  }

  return 0;
}
