import * as dotenv from 'dotenv';
import { ConfigError } from '../core/errors';

dotenv.config();

export interface PipelineConfig {
  sourceUrl: string;
  outputPath: string;
  timeoutMs: number;
  logDir: string;
  logLevel: string;
}

export type ConfigOverrides = Partial<Pick<PipelineConfig, 'sourceUrl' | 'outputPath' | 'timeoutMs'>>;

export const DEFAULT_SOURCE_URL = 'https://jsonplaceholder.typicode.com/users';
export const DEFAULT_OUTPUT_PATH = 'output/users_cleaned.csv';
export const DEFAULT_TIMEOUT_MS = 5000;

export function parseTimeout(value: string): number {
  const timeoutMs = Number(value);
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    throw new ConfigError(`Invalid request timeout: ${value}`);
  }
  return timeoutMs;
}

function assertHttpUrl(value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch (error) {
    throw new ConfigError(`Invalid source URL: ${value}`, error);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigError(`Unsupported source URL protocol: ${url.protocol}`);
  }
  return value;
}

export function loadPipelineConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): PipelineConfig {
  const config: PipelineConfig = {
    sourceUrl: overrides.sourceUrl ?? (env.ETL_SOURCE_URL || DEFAULT_SOURCE_URL),
    outputPath: overrides.outputPath ?? (env.ETL_OUTPUT_PATH || DEFAULT_OUTPUT_PATH),
    timeoutMs: overrides.timeoutMs ?? parseTimeout(env.ETL_TIMEOUT_MS || String(DEFAULT_TIMEOUT_MS)),
    logDir: env.ETL_LOG_DIR || 'logs',
    logLevel: env.ETL_LOG_LEVEL || 'info'
  };

  assertHttpUrl(config.sourceUrl);
  return config;
}
