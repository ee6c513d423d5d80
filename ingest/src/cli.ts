/**
 * Viewing periods CLI — Entry point
 *
 * Normalizes CSV/TSV viewing period exports and prints one record per line.
 *
 * Usage:
 *   npm start -- data/periods.csv
 *   npm start -- --json data/a.csv data/b.tsv
 *
 * Environment (.env):
 *   LOG_LEVEL      debug | info | warn | error (default info)
 *   OUTPUT_FORMAT  text | json (default text)
 */

import { loadConfig } from './config.js';
import { runCli } from './run.js';
import { createLogger, setLogLevel } from './utils/logger.js';

const log = createLogger('main');

function main(): void {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const code = runCli(process.argv.slice(2), config, (line) => {
    process.stdout.write(`${line}\n`);
  });
  process.exitCode = code;
}

try {
  main();
} catch (err) {
  log.error('Fatal error', err);
  process.exit(1);
}
