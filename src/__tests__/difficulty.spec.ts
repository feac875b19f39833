import { describe, expect, test } from 'vitest';
import type { DifficultyLookup } from '../dataset/datasetIndex.js';
import {
  aggregateByDifficulty,
  resolveDifficulty,
  weightedScore,
  type ScoredQuestion
} from '../stats/difficulty.js';
import type { DifficultyTag } from '../types.js';

function lookup(entries: Record<string, DifficultyTag>): DifficultyLookup {
  return { difficultyOf: (questionId) => entries[questionId] ?? 'unknown' };
}

const INDEX = lookup({ e1: 'easy', e2: 'easy', m1: 'medium', m2: 'medium', h1: 'hard', h2: 'hard' });

const MIXED: ScoredQuestion[] = [
  { questionId: 'e1', successRate: 1 },
  { questionId: 'e2', successRate: 1 },
  { questionId: 'm1', successRate: 1 },
  { questionId: 'm2', successRate: 0 },
  { questionId: 'h1', successRate: 0 },
  { questionId: 'h2', successRate: 0 }
];

describe('aggregateByDifficulty', () => {
  test('buckets results through the index and computes percentages', () => {
    const stats = aggregateByDifficulty(MIXED, INDEX);
    expect(stats.easy).toEqual({ total: 2, completed: 2, successSum: 2, passed: 2, percentage: 100 });
    expect(stats.medium.percentage).toBe(50);
    expect(stats.hard.percentage).toBe(0);
    expect(stats.total).toEqual({ total: 6, completed: 6, successSum: 3, passed: 3, percentage: 50 });
  });

  test('falls back to the result tag, then to medium', () => {
    const stats = aggregateByDifficulty(
      [
        { questionId: 'x1', difficulty: 'Hard', successRate: 1 },
        { questionId: 'x2', successRate: 0.5 }
      ],
      lookup({})
    );
    expect(stats.hard.completed).toBe(1);
    expect(stats.medium.completed).toBe(1);
    expect(stats.medium.percentage).toBe(50);
  });

  test('prefers the index over the result tag', () => {
    expect(resolveDifficulty({ questionId: 'e1', difficulty: 'hard', successRate: 1 }, INDEX)).toBe('easy');
  });

  test('credits fractional success', () => {
    const stats = aggregateByDifficulty(
      [
        { questionId: 'e1', successRate: 0.25 },
        { questionId: 'e2', successRate: 0.5 }
      ],
      INDEX
    );
    expect(stats.easy.passed).toBe(0.75);
    expect(stats.easy.percentage).toBe(37.5);
  });

  test('reports zero for empty buckets', () => {
    const stats = aggregateByDifficulty([], INDEX);
    expect(stats.hard).toEqual({ total: 0, completed: 0, successSum: 0, passed: 0, percentage: 0 });
    expect(weightedScore(stats)).toBe(0);
  });

  test('uses expected counts as bucket totals without changing percentages', () => {
    const stats = aggregateByDifficulty(MIXED.slice(0, 3), INDEX, { expected: { easy: 5, hard: 4 } });
    expect(stats.easy.total).toBe(5);
    expect(stats.easy.percentage).toBe(100);
    expect(stats.medium.total).toBe(1);
    expect(stats.hard.total).toBe(4);
    expect(stats.total.total).toBe(10);
  });
});

describe('weightedScore', () => {
  test('weights easy, medium and hard 1, 3 and 5', () => {
    const score = weightedScore(aggregateByDifficulty(MIXED, INDEX));
    expect(score).toBeCloseTo(250 / 9, 10);
    expect(score.toFixed(2)).toBe('27.78');
  });

  test('is 100 when every bucket is perfect', () => {
    const perfect = MIXED.map((result) => ({ ...result, successRate: 1 }));
    expect(weightedScore(aggregateByDifficulty(perfect, INDEX))).toBe(100);
  });

  test('grows with each bucket percentage', () => {
    const bucket = (percentage: number) => ({ total: 1, completed: 1, successSum: 0, passed: 0, percentage });
    const base = weightedScore({ easy: bucket(40), medium: bucket(40), hard: bucket(40) });
    expect(weightedScore({ easy: bucket(60), medium: bucket(40), hard: bucket(40) })).toBeGreaterThan(base);
    expect(weightedScore({ easy: bucket(40), medium: bucket(60), hard: bucket(40) })).toBeGreaterThan(base);
    expect(weightedScore({ easy: bucket(40), medium: bucket(40), hard: bucket(60) })).toBeGreaterThan(base);
  });
});
