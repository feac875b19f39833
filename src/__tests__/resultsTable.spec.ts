import { describe, expect, it } from 'vitest';
import { buildResultsCsv, buildResultsMarkdown } from '../reports/resultsTable.js';
import type { CompletedRunSummary } from '../types.js';

const SUMMARY: CompletedRunSummary = {
  key: 'qwen:7b::simple::2025-01-01T00:00:00.000Z',
  model: 'qwen:7b',
  architecture: 'simple',
  startedAt: '2025-01-01T00:00:00.000Z',
  completedAt: '2025-01-01T00:10:00.000Z',
  resultFile: 'qwen_7b_simple_20250101T000000.json',
  totalInputTokens: 600,
  totalOutputTokens: 2_000,
  score: 350 / 9,
  totalQuestions: 3,
  totalTime: 100,
  tokensPerSecond: 20,
  easyPercentage: 100,
  mediumPercentage: 0,
  hardPercentage: 50,
  totalPercentage: 50,
  easyTotal: 1,
  easyPassed: 1,
  mediumTotal: 1,
  mediumPassed: 0,
  hardTotal: 1,
  hardPassed: 0.5,
  totalPassed: 1.5
};

describe('buildResultsCsv', () => {
  it('writes a header and one row per run', () => {
    const lines = buildResultsCsv([SUMMARY]).trimEnd().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toBe(
      'model,architecture,score,easy_pct,medium_pct,hard_pct,total_pct,easy_passed,easy_total,' +
        'medium_passed,medium_total,hard_passed,hard_total,total_questions,total_time_s,' +
        'tokens_per_second,input_tokens,output_tokens,started_at,completed_at,result_file'
    );
    expect(lines[1]).toBe(
      'qwen:7b,simple,38.89,100.00,0.00,50.00,50.00,1.00,1,0.00,1,0.50,1,3,100.0,20.00,600,2000,' +
        '2025-01-01T00:00:00.000Z,2025-01-01T00:10:00.000Z,qwen_7b_simple_20250101T000000.json'
    );
  });
});

describe('buildResultsMarkdown', () => {
  it('renders a ranked table', () => {
    const markdown = buildResultsMarkdown([SUMMARY, { ...SUMMARY, model: 'llama:8b', score: 10 }]);
    const lines = markdown.split('\n');
    expect(lines[0]).toBe('## Results');
    expect(lines[2]).toBe('| # | Model | Arch | Score | Easy | Medium | Hard | Total | Tok/s | Time (s) |');
    expect(lines[4]).toBe(
      '| 1 | qwen:7b | simple | 38.9 | 100.0% (1.0/1) | 0.0% (0.0/1) | 50.0% (0.5/1) | 50.0 | 20.0 | 100 |'
    );
    expect(lines[5]?.startsWith('| 2 | llama:8b | simple | 10.0 |')).toBe(true);
  });

  it('notes when there is nothing to show', () => {
    expect(buildResultsMarkdown([])).toBe('## Results\n\n_No completed runs._\n');
  });
});
