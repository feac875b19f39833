import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import path from 'path';
import { loadConfig, loadDefaults } from '../config.js';

const ORIGINAL_ENV = { ...process.env };
const MONITOR_VARS = [
  'BENCH_BASE_DIR',
  'BENCH_RESULTS_DIR',
  'BENCH_DATASET_FILE',
  'POLL_INTERVAL_MS',
  'READ_RETRY_ATTEMPTS',
  'READ_RETRY_BACKOFF_MS',
  'WATCH_ENABLED',
  'PROM_PORT',
  'LOG_LEVEL',
  'EXPORT_DIR'
];

describe('config loader', () => {
  beforeEach(() => {
    process.env = { ...ORIGINAL_ENV };
    for (const name of MONITOR_VARS) {
      delete process.env[name];
    }
  });

  afterEach(() => {
    process.env = { ...ORIGINAL_ENV };
  });

  test('falls back to the bundled defaults', async () => {
    process.env.BENCH_BASE_DIR = '/srv/bench';
    const config = await loadConfig();
    expect(config.paths.stateDir).toBe(path.join('/srv/bench', '.tui_state'));
    expect(config.paths.resultsDir).toBe(path.join('/srv/bench', 'results'));
    expect(config.datasetFile).toBe(path.join('/srv/bench', 'data', 'dataset.jsonl'));
    expect(config.exportDir).toBe(path.join('/srv/bench', 'reports'));
    expect(config.pollIntervalMs).toBe(500);
    expect(config.readRetry).toEqual({ attempts: 3, backoffMs: 25 });
    expect(config.watchEnabled).toBe(true);
    expect(config.promPort).toBe(0);
    expect(config.logLevel).toBe('info');
  });

  test('reads overrides from the environment', async () => {
    process.env.BENCH_BASE_DIR = '/srv/bench';
    process.env.BENCH_RESULTS_DIR = '/data/results';
    process.env.POLL_INTERVAL_MS = '250';
    process.env.READ_RETRY_ATTEMPTS = '5';
    process.env.WATCH_ENABLED = 'off';
    process.env.PROM_PORT = '9464';
    process.env.LOG_LEVEL = 'DEBUG';
    const config = await loadConfig();
    expect(config.paths.resultsDir).toBe('/data/results');
    expect(config.pollIntervalMs).toBe(250);
    expect(config.readRetry.attempts).toBe(5);
    expect(config.watchEnabled).toBe(false);
    expect(config.promPort).toBe(9464);
    expect(config.logLevel).toBe('debug');
  });

  test('names the variable that fails to parse', async () => {
    process.env.POLL_INTERVAL_MS = 'soon';
    await expect(loadConfig()).rejects.toThrow('Environment variable POLL_INTERVAL_MS must be an integer');
    process.env.POLL_INTERVAL_MS = '0';
    await expect(loadConfig()).rejects.toThrow('Environment variable POLL_INTERVAL_MS must be >= 1');
    delete process.env.POLL_INTERVAL_MS;
    process.env.WATCH_ENABLED = 'maybe';
    await expect(loadConfig()).rejects.toThrow('Environment variable WATCH_ENABLED must be boolean');
  });

  test('bundled defaults validate', async () => {
    const defaults = await loadDefaults();
    expect(defaults.resultsDirName).toBe('results');
  });
});
