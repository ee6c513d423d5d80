import 'dotenv/config';
import { ConfigurationError } from './errors.js';
import { isLogLevel, type LogLevel } from './utils/logger.js';

// ----- Output format -----
export type OutputFormat = 'text' | 'json';

function isOutputFormat(value: string): value is OutputFormat {
  return value === 'text' || value === 'json';
}

export interface IngestConfig {
  logLevel: LogLevel;
  outputFormat: OutputFormat;
}

// ----- Environment -----
export function loadConfig(env: NodeJS.ProcessEnv = process.env): IngestConfig {
  const logLevel = env.LOG_LEVEL || 'info';
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(`invalid LOG_LEVEL '${logLevel}' (debug | info | warn | error)`);
  }

  const outputFormat = env.OUTPUT_FORMAT || 'text';
  if (!isOutputFormat(outputFormat)) {
    throw new ConfigurationError(`invalid OUTPUT_FORMAT '${outputFormat}' (text | json)`);
  }

  return { logLevel, outputFormat };
}
