import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { resolveStatePaths } from './state/paths.js';
import type { MonitorConfig } from './types.js';

const DEFAULTS_URL = new URL('../config/monitor_defaults.json', import.meta.url);

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const DEFAULTS_SCHEMA = z.object({
  resultsDirName: z.string().min(1),
  datasetFile: z.string().min(1),
  exportDirName: z.string().min(1),
  pollIntervalMs: z.number().int().positive(),
  readRetry: z.object({
    attempts: z.number().int().positive(),
    backoffMs: z.number().int().nonnegative()
  }),
  watchEnabled: z.boolean(),
  promPort: z.number().int().min(0).max(65_535),
  logLevel: z.enum(LOG_LEVELS)
});

export type MonitorDefaults = z.infer<typeof DEFAULTS_SCHEMA>;

function getOptional(envName: string): string | undefined {
  const value = process.env[envName];
  if (!value || value.trim().length === 0) {
    return undefined;
  }
  return value.trim();
}

function parseIntEnv(envName: string, fallback: number, min: number): number {
  const value = getOptional(envName);
  if (!value) return fallback;
  if (!/^-?\d+$/.test(value)) {
    throw new Error(`Environment variable ${envName} must be an integer`);
  }
  const parsed = Number.parseInt(value, 10);
  if (parsed < min) {
    throw new Error(`Environment variable ${envName} must be >= ${min}`);
  }
  return parsed;
}

function parseBoolEnv(envName: string, fallback: boolean): boolean {
  const value = getOptional(envName);
  if (!value) return fallback;
  const normalized = value.toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new Error(`Environment variable ${envName} must be boolean`);
}

function parseLogLevelEnv(envName: string, fallback: MonitorDefaults['logLevel']): string {
  const value = getOptional(envName);
  if (!value) return fallback;
  const parsed = z.enum(LOG_LEVELS).safeParse(value.toLowerCase());
  if (!parsed.success) {
    throw new Error(`Environment variable ${envName} must be one of ${LOG_LEVELS.join(', ')}`);
  }
  return parsed.data;
}

export async function loadDefaults(): Promise<MonitorDefaults> {
  const contents = await fs.readFile(DEFAULTS_URL, 'utf8');
  const parsed = DEFAULTS_SCHEMA.safeParse(JSON.parse(contents));
  if (!parsed.success) {
    throw new Error(`Invalid monitor_defaults.json: ${parsed.error.message}`);
  }
  return parsed.data;
}

export async function loadConfig(): Promise<MonitorConfig> {
  const defaults = await loadDefaults();
  const baseDir = path.resolve(getOptional('BENCH_BASE_DIR') ?? process.cwd());
  const resultsDir = path.resolve(baseDir, getOptional('BENCH_RESULTS_DIR') ?? defaults.resultsDirName);
  const promPort = parseIntEnv('PROM_PORT', defaults.promPort, 0);
  if (promPort > 65_535) {
    throw new Error('Environment variable PROM_PORT must be a valid port');
  }

  return {
    paths: resolveStatePaths(baseDir, resultsDir),
    datasetFile: path.resolve(baseDir, getOptional('BENCH_DATASET_FILE') ?? defaults.datasetFile),
    exportDir: path.resolve(baseDir, getOptional('EXPORT_DIR') ?? defaults.exportDirName),
    pollIntervalMs: parseIntEnv('POLL_INTERVAL_MS', defaults.pollIntervalMs, 1),
    readRetry: {
      attempts: parseIntEnv('READ_RETRY_ATTEMPTS', defaults.readRetry.attempts, 1),
      backoffMs: parseIntEnv('READ_RETRY_BACKOFF_MS', defaults.readRetry.backoffMs, 0)
    },
    watchEnabled: parseBoolEnv('WATCH_ENABLED', defaults.watchEnabled),
    promPort,
    logLevel: parseLogLevelEnv('LOG_LEVEL', defaults.logLevel)
  };
}
