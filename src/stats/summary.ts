import type { DifficultyLookup } from '../dataset/datasetIndex.js';
import type { CompletedRunSummary, RunResultInput, RunState } from '../types.js';
import { aggregateByDifficulty, weightedScore } from './difficulty.js';

export function summaryKey(
  model: string,
  architecture: string,
  startedAt: string | null,
  resultFile: string | null
): string {
  return `${model}::${architecture}::${startedAt ?? resultFile ?? 'unknown'}`;
}

export function toRunResultInput(run: RunState, completedAt: string | null = null): RunResultInput {
  return {
    model: run.model,
    architecture: run.architecture,
    startedAt: run.startedAt,
    completedAt,
    totalTestTime: run.results.reduce((sum, result) => sum + result.totalTime, 0),
    tokensPerSecond: 0,
    results: run.results.map((result) => ({
      questionId: result.questionId,
      difficulty: result.difficulty,
      successRate: result.successRate,
      passedTests: result.passedTests,
      totalTests: result.totalTests,
      totalTime: result.totalTime,
      codeGenerationTime: result.codeGenerationTime,
      inputTokens: result.inputTokens,
      outputTokens: result.outputTokens,
      error: result.error
    }))
  };
}

export function summarizeRunResult(
  input: RunResultInput,
  index: DifficultyLookup,
  resultFile: string | null = null
): CompletedRunSummary {
  const stats = aggregateByDifficulty(input.results, index);
  const totalInputTokens = input.results.reduce((sum, entry) => sum + entry.inputTokens, 0);
  const totalOutputTokens = input.results.reduce((sum, entry) => sum + entry.outputTokens, 0);
  const summedTime = input.results.reduce((sum, entry) => sum + entry.totalTime, 0);
  const totalTime = summedTime > 0 ? summedTime : input.totalTestTime;
  const tokensPerSecond = totalTime > 0 ? totalOutputTokens / totalTime : input.tokensPerSecond;

  return {
    key: summaryKey(input.model, input.architecture, input.startedAt, resultFile),
    model: input.model,
    architecture: input.architecture,
    startedAt: input.startedAt,
    completedAt: input.completedAt,
    resultFile,
    totalInputTokens,
    totalOutputTokens,
    score: weightedScore(stats),
    totalQuestions: input.results.length,
    totalTime,
    tokensPerSecond,
    easyPercentage: stats.easy.percentage,
    mediumPercentage: stats.medium.percentage,
    hardPercentage: stats.hard.percentage,
    totalPercentage: stats.total.percentage,
    easyTotal: stats.easy.total,
    easyPassed: stats.easy.passed,
    mediumTotal: stats.medium.total,
    mediumPassed: stats.medium.passed,
    hardTotal: stats.hard.total,
    hardPassed: stats.hard.passed,
    totalPassed: stats.total.passed
  };
}

export function compareSummaries(a: CompletedRunSummary, b: CompletedRunSummary): number {
  if (b.score !== a.score) return b.score - a.score;
  return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
}
