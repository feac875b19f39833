import type { DifficultyLookup } from '../dataset/datasetIndex.js';
import { DIFFICULTIES, type Difficulty } from '../types.js';

export type BucketName = Difficulty | 'total';

export interface BucketStats {
  /** Questions planned for the bucket; equals `completed` unless expected counts were given. */
  readonly total: number;
  readonly completed: number;
  readonly successSum: number;
  /** Fractional credit: the success-ratio sum, not a count of fully passing questions. */
  readonly passed: number;
  readonly percentage: number;
}

export type DifficultyStats = Readonly<Record<BucketName, BucketStats>>;

export interface ScoredQuestion {
  readonly questionId: string;
  readonly difficulty?: string;
  readonly successRate: number;
}

export interface AggregateOptions {
  readonly expected?: Partial<Record<Difficulty, number>>;
}

export const DIFFICULTY_WEIGHTS: Readonly<Record<Difficulty, number>> = {
  easy: 1,
  medium: 3,
  hard: 5
};

const WEIGHT_SUM = DIFFICULTIES.reduce((sum, difficulty) => sum + DIFFICULTY_WEIGHTS[difficulty], 0);

function isDifficulty(value: string | undefined): value is Difficulty {
  return value === 'easy' || value === 'medium' || value === 'hard';
}

export function resolveDifficulty(question: ScoredQuestion, index: DifficultyLookup): Difficulty {
  const indexed = index.difficultyOf(question.questionId);
  if (indexed !== 'unknown') return indexed;
  const own = question.difficulty?.trim().toLowerCase();
  return isDifficulty(own) ? own : 'medium';
}

function buildBucket(completed: number, successSum: number, expected?: number): BucketStats {
  return {
    total: Math.max(expected ?? 0, completed),
    completed,
    successSum,
    passed: successSum,
    percentage: completed > 0 ? (successSum / completed) * 100 : 0
  };
}

export function aggregateByDifficulty(
  results: readonly ScoredQuestion[],
  index: DifficultyLookup,
  options: AggregateOptions = {}
): DifficultyStats {
  const counts: Record<Difficulty, { completed: number; successSum: number }> = {
    easy: { completed: 0, successSum: 0 },
    medium: { completed: 0, successSum: 0 },
    hard: { completed: 0, successSum: 0 }
  };

  for (const result of results) {
    const bucket = counts[resolveDifficulty(result, index)];
    bucket.completed += 1;
    bucket.successSum += result.successRate;
  }

  const expected: Partial<Record<Difficulty, number>> = options.expected ?? {};
  const easy = buildBucket(counts.easy.completed, counts.easy.successSum, expected.easy);
  const medium = buildBucket(counts.medium.completed, counts.medium.successSum, expected.medium);
  const hard = buildBucket(counts.hard.completed, counts.hard.successSum, expected.hard);
  const total = buildBucket(
    easy.completed + medium.completed + hard.completed,
    easy.successSum + medium.successSum + hard.successSum,
    easy.total + medium.total + hard.total
  );

  return { easy, medium, hard, total };
}

/** (easy% · 1 + medium% · 3 + hard% · 5) / 9. */
export function weightedScore(stats: Pick<DifficultyStats, Difficulty>): number {
  const weighted = DIFFICULTIES.reduce(
    (sum, difficulty) => sum + stats[difficulty].percentage * DIFFICULTY_WEIGHTS[difficulty],
    0
  );
  return weighted / WEIGHT_SUM;
}
