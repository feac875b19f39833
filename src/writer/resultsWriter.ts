import path from 'path';
import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc.js';
import type { DifficultyLookup } from '../dataset/datasetIndex.js';
import { writeJsonAtomic } from '../state/atomicWrite.js';
import { safeFileToken } from '../state/paths.js';
import { summarizeRunResult, toRunResultInput } from '../stats/summary.js';
import type { Clock, RunState } from '../types.js';

dayjs.extend(utc);

/** Lookup that defers to each result's own difficulty tag. */
export const SELF_TAGGED: DifficultyLookup = { difficultyOf: () => 'unknown' };

export function resultFileName(run: Pick<RunState, 'model' | 'architecture' | 'startedAt'>): string {
  const stamp = run.startedAt ? dayjs.utc(run.startedAt).format('YYYYMMDD[T]HHmmss') : 'unstarted';
  return `${safeFileToken(run.model)}_${safeFileToken(run.architecture)}_${stamp}.json`;
}

/** Serializes a run into the benchmark's snake_case result layout. */
export function buildResultDocument(
  run: RunState,
  completedAt: string,
  index: DifficultyLookup = SELF_TAGGED
): Record<string, unknown> {
  const summary = summarizeRunResult(toRunResultInput(run, completedAt), index);
  return {
    model: run.model,
    architecture: run.architecture,
    started_at: run.startedAt,
    completed_at: completedAt,
    total_test_time: summary.totalTime,
    total_input_tokens: summary.totalInputTokens,
    total_output_tokens: summary.totalOutputTokens,
    score: summary.score,
    tokens_per_second: summary.tokensPerSecond,
    results: run.results.map((result) => ({
      question_id: result.questionId,
      difficulty: result.difficulty,
      total_time: result.totalTime,
      code_generation_time: result.codeGenerationTime,
      passed_tests: result.passedTests,
      total_tests: result.totalTests,
      success_rate: result.successRate,
      total_input_tokens: result.inputTokens,
      total_output_tokens: result.outputTokens,
      error: result.error ?? null
    }))
  };
}

export async function writeResultFile(
  resultsDir: string,
  run: RunState,
  clock: Clock,
  index?: DifficultyLookup
): Promise<string> {
  const target = path.join(resultsDir, resultFileName(run));
  const completedAt = new Date(clock.now()).toISOString();
  await writeJsonAtomic(target, buildResultDocument(run, completedAt, index));
  return target;
}
