import { stringify } from 'csv-stringify/sync';
import type { CompletedRunSummary } from '../types.js';

const CSV_COLUMNS = [
  'model',
  'architecture',
  'score',
  'easy_pct',
  'medium_pct',
  'hard_pct',
  'total_pct',
  'easy_passed',
  'easy_total',
  'medium_passed',
  'medium_total',
  'hard_passed',
  'hard_total',
  'total_questions',
  'total_time_s',
  'tokens_per_second',
  'input_tokens',
  'output_tokens',
  'started_at',
  'completed_at',
  'result_file'
] as const;

type CsvColumn = (typeof CSV_COLUMNS)[number];
type CsvRow = Record<CsvColumn, string | number>;

function formatFixed(value: number, decimals: number): string {
  if (!Number.isFinite(value)) {
    return '0';
  }
  return value.toFixed(decimals);
}

function toCsvRow(summary: CompletedRunSummary): CsvRow {
  return {
    model: summary.model,
    architecture: summary.architecture,
    score: formatFixed(summary.score, 2),
    easy_pct: formatFixed(summary.easyPercentage, 2),
    medium_pct: formatFixed(summary.mediumPercentage, 2),
    hard_pct: formatFixed(summary.hardPercentage, 2),
    total_pct: formatFixed(summary.totalPercentage, 2),
    easy_passed: formatFixed(summary.easyPassed, 2),
    easy_total: summary.easyTotal,
    medium_passed: formatFixed(summary.mediumPassed, 2),
    medium_total: summary.mediumTotal,
    hard_passed: formatFixed(summary.hardPassed, 2),
    hard_total: summary.hardTotal,
    total_questions: summary.totalQuestions,
    total_time_s: formatFixed(summary.totalTime, 1),
    tokens_per_second: formatFixed(summary.tokensPerSecond, 2),
    input_tokens: summary.totalInputTokens,
    output_tokens: summary.totalOutputTokens,
    started_at: summary.startedAt ?? '',
    completed_at: summary.completedAt ?? '',
    result_file: summary.resultFile ?? ''
  };
}

export function buildResultsCsv(summaries: readonly CompletedRunSummary[]): string {
  return stringify(summaries.map(toCsvRow), { header: true, columns: [...CSV_COLUMNS] });
}

function bucketCell(percentage: number, passed: number, total: number): string {
  return `${formatFixed(percentage, 1)}% (${formatFixed(passed, 1)}/${total})`;
}

/** Leaderboard in the order given; callers pass summaries already sorted by score. */
export function buildResultsMarkdown(summaries: readonly CompletedRunSummary[]): string {
  const header = ['#', 'Model', 'Arch', 'Score', 'Easy', 'Medium', 'Hard', 'Total', 'Tok/s', 'Time (s)'];
  const lines = summaries.map((summary, position) => [
    String(position + 1),
    summary.model,
    summary.architecture,
    formatFixed(summary.score, 1),
    bucketCell(summary.easyPercentage, summary.easyPassed, summary.easyTotal),
    bucketCell(summary.mediumPercentage, summary.mediumPassed, summary.mediumTotal),
    bucketCell(summary.hardPercentage, summary.hardPassed, summary.hardTotal),
    formatFixed(summary.totalPercentage, 1),
    formatFixed(summary.tokensPerSecond, 1),
    formatFixed(summary.totalTime, 0)
  ]);
  const table = [
    `| ${header.join(' | ')} |`,
    `| ${header.map(() => '---').join(' | ')} |`,
    ...lines.map((cells) => `| ${cells.join(' | ')} |`)
  ];
  return ['## Results', '', ...(summaries.length > 0 ? table : ['_No completed runs._']), ''].join('\n');
}
