import fs from 'fs/promises';
import path from 'path';
import pLimit from 'p-limit';
import type { DifficultyLookup } from '../dataset/datasetIndex.js';
import { StateValidationError, errnoCode } from '../errors.js';
import { readJsonWithRetry, type ReadWithRetryOptions } from '../state/readRetry.js';
import { RESULT_FILE_SCHEMA, formatIssues } from '../state/schemas.js';
import { TEMP_SUFFIX } from '../state/paths.js';
import { compareSummaries, summarizeRunResult } from '../stats/summary.js';
import type { CompletedRunSummary } from '../types.js';

const READ_CONCURRENCY = 4;

export interface ResultsLoadFailure {
  readonly filePath: string;
  /** Raw content the failure refers to, used to report each bad version once. */
  readonly raw: string;
  readonly error: StateValidationError;
}

export interface ResultsLoad {
  readonly summaries: readonly CompletedRunSummary[];
  readonly failures: readonly ResultsLoadFailure[];
  /** File path → summary for every file that contributed to `summaries`. */
  readonly sources: ReadonlyMap<string, CompletedRunSummary>;
  /** Files whose reads kept failing; their previous summary is reused when there is one. */
  readonly unavailable: readonly string[];
}

type FileLoad =
  | { readonly status: 'ok'; readonly filePath: string; readonly summary: CompletedRunSummary }
  | { readonly status: 'failed'; readonly failure: ResultsLoadFailure }
  | { readonly status: 'unavailable'; readonly filePath: string }
  | { readonly status: 'skipped' };

export async function listResultFiles(resultsDir: string): Promise<string[]> {
  let names: string[];
  try {
    names = await fs.readdir(resultsDir);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return [];
    throw error;
  }
  return names
    .filter((name) => name.endsWith('.json') && !name.endsWith(TEMP_SUFFIX) && !name.startsWith('.'))
    .sort()
    .map((name) => path.join(resultsDir, name));
}

async function loadResultFile(
  filePath: string,
  index: DifficultyLookup,
  retry: ReadWithRetryOptions
): Promise<FileLoad> {
  const outcome = await readJsonWithRetry(filePath, retry);
  switch (outcome.status) {
    case 'missing':
      return { status: 'skipped' };
    case 'unavailable':
      return { status: 'unavailable', filePath };
    case 'unparsable':
      return {
        status: 'failed',
        failure: {
          filePath,
          raw: outcome.raw,
          error: new StateValidationError(
            'results',
            filePath,
            `result file is not valid JSON: ${outcome.error.message}`
          )
        }
      };
    case 'ok': {
      const parsed = RESULT_FILE_SCHEMA.safeParse(outcome.value);
      if (!parsed.success) {
        return {
          status: 'failed',
          failure: {
            filePath,
            raw: outcome.raw,
            error: new StateValidationError(
              'results',
              filePath,
              `result file failed validation: ${formatIssues(parsed.error.issues)}`,
              parsed.error.issues
            )
          }
        };
      }
      return { status: 'ok', filePath, summary: summarizeRunResult(parsed.data, index, path.basename(filePath)) };
    }
  }
}

/**
 * Reads every result file in the directory and returns the summaries best score first.
 * A file that cannot be read right now keeps its summary from `previous`.
 */
export async function loadCompletedRuns(
  resultsDir: string,
  index: DifficultyLookup,
  retry: ReadWithRetryOptions,
  previous: ReadonlyMap<string, CompletedRunSummary> = new Map()
): Promise<ResultsLoad> {
  const files = await listResultFiles(resultsDir);
  const limit = pLimit(READ_CONCURRENCY);
  const loads = await Promise.all(
    files.map((filePath) => limit(() => loadResultFile(filePath, index, retry)))
  );

  const sources = new Map<string, CompletedRunSummary>();
  const failures: ResultsLoadFailure[] = [];
  const unavailable: string[] = [];
  for (const load of loads) {
    switch (load.status) {
      case 'ok':
        sources.set(load.filePath, load.summary);
        break;
      case 'failed':
        failures.push(load.failure);
        break;
      case 'unavailable': {
        unavailable.push(load.filePath);
        const last = previous.get(load.filePath);
        if (last) sources.set(load.filePath, last);
        break;
      }
      case 'skipped':
        break;
    }
  }
  const summaries = [...sources.values()].sort(compareSummaries);
  return { summaries, failures, sources, unavailable };
}
