import { z } from 'zod';
import {
  RUN_STATUSES,
  STATE_DOCUMENT_VERSION,
  type Checkpoint,
  type DifficultyTag,
  type LauncherState,
  type QuestionResult,
  type QuestionState,
  type RunResultInput,
  type RunState
} from '../types.js';

const count = z.number().int().nonnegative();
const seconds = z.number().nonnegative();
const isoTimestamp = z.string().min(1);

const DIFFICULTY_TAG_SCHEMA = z
  .string()
  .transform((value): DifficultyTag => {
    const normalized = value.trim().toLowerCase();
    return normalized === 'easy' || normalized === 'medium' || normalized === 'hard'
      ? normalized
      : 'unknown';
  });

const RUN_STATUS_SCHEMA = z.enum(RUN_STATUSES);

export const QUESTION_RESULT_SCHEMA: z.ZodType<QuestionResult, z.ZodTypeDef, unknown> = z.object({
  questionId: z.string().min(1),
  difficulty: DIFFICULTY_TAG_SCHEMA,
  passedTests: count,
  totalTests: count,
  successRate: z.number().min(0).max(1),
  totalTime: seconds,
  codeGenerationTime: seconds.default(0),
  inputTokens: count.default(0),
  outputTokens: count.default(0),
  error: z.string().optional()
});

export const QUESTION_STATE_SCHEMA: z.ZodType<QuestionState, z.ZodTypeDef, unknown> = z
  .object({
    questionId: z.string().min(1),
    difficulty: DIFFICULTY_TAG_SCHEMA,
    title: z.string().default(''),
    index: z.number().int().positive(),
    total: z.number().int().positive(),
    status: RUN_STATUS_SCHEMA,
    startedAt: isoTimestamp,
    inputTokens: count,
    outputTokens: count,
    currentTest: count.default(0),
    totalTests: count.default(0),
    passedTests: count.default(0)
  })
  .refine((question) => question.index <= question.total, {
    message: 'question index exceeds total',
    path: ['index']
  });

export const RUN_STATE_SCHEMA: z.ZodType<RunState, z.ZodTypeDef, unknown> = z
  .object({
    version: z.number().int().positive().default(STATE_DOCUMENT_VERSION),
    model: z.string(),
    architecture: z.string(),
    status: RUN_STATUS_SCHEMA,
    startedAt: isoTimestamp.nullable(),
    totalQuestions: count,
    currentQuestion: QUESTION_STATE_SCHEMA.nullable().default(null),
    totalInputTokens: count,
    totalOutputTokens: count,
    elapsedSeconds: seconds.default(0),
    results: z.array(QUESTION_RESULT_SCHEMA).default([]),
    error: z.string().optional()
  })
  .refine(
    (run) => run.currentQuestion === null || run.currentQuestion.total === run.totalQuestions,
    { message: 'current question total differs from run total', path: ['currentQuestion', 'total'] }
  );

const GRID_ITEM_SCHEMA = z.object({
  model: z.string().min(1),
  architecture: z.string().min(1),
  completed: z.boolean().default(false),
  score: z.number().min(0).max(100).optional(),
  resultFile: z.string().optional()
});

export const LAUNCHER_STATE_SCHEMA: z.ZodType<LauncherState, z.ZodTypeDef, unknown> = z
  .object({
    version: z.number().int().positive().default(STATE_DOCUMENT_VERSION),
    grid: z.array(GRID_ITEM_SCHEMA),
    currentIndex: count,
    startedAt: isoTimestamp.nullable().default(null),
    finishedAt: isoTimestamp.nullable().default(null)
  })
  .refine((launcher) => launcher.currentIndex <= launcher.grid.length, {
    message: 'currentIndex outside grid',
    path: ['currentIndex']
  });

export const CHECKPOINT_SCHEMA: z.ZodType<Checkpoint, z.ZodTypeDef, unknown> = z
  .object({
    version: z.number().int().positive().default(STATE_DOCUMENT_VERSION),
    lastCompletedIndex: z.number().int().min(-1),
    totalItems: count,
    savedAt: isoTimestamp
  })
  .refine((checkpoint) => checkpoint.lastCompletedIndex < checkpoint.totalItems, {
    message: 'lastCompletedIndex outside grid',
    path: ['lastCompletedIndex']
  });

const RESULT_ENTRY_SCHEMA = z
  .object({
    question_id: z.string().min(1),
    difficulty: z.string().optional(),
    success_rate: z.number().min(0).max(1),
    passed_tests: count.default(0),
    total_tests: count.default(0),
    total_time: seconds.default(0),
    code_generation_time: seconds.default(0),
    total_input_tokens: count.default(0),
    total_output_tokens: count.default(0),
    error: z.string().nullable().optional()
  })
  .passthrough()
  .transform((entry) => ({
    questionId: entry.question_id,
    difficulty: entry.difficulty,
    successRate: entry.success_rate,
    passedTests: entry.passed_tests,
    totalTests: entry.total_tests,
    totalTime: entry.total_time,
    codeGenerationTime: entry.code_generation_time,
    inputTokens: entry.total_input_tokens,
    outputTokens: entry.total_output_tokens,
    error: entry.error
  }));

/** Result files use the benchmark's snake_case layout; extra keys such as `code` are ignored. */
export const RESULT_FILE_SCHEMA: z.ZodType<RunResultInput, z.ZodTypeDef, unknown> = z
  .object({
    model: z.string().default('unknown'),
    architecture: z.string().default('unknown'),
    started_at: isoTimestamp.nullable().optional(),
    completed_at: isoTimestamp.nullable().optional(),
    total_test_time: seconds.default(0),
    tokens_per_second: z.number().nonnegative().default(0),
    results: z.array(RESULT_ENTRY_SCHEMA).default([])
  })
  .passthrough()
  .transform((file) => ({
    model: file.model,
    architecture: file.architecture,
    startedAt: file.started_at ?? null,
    completedAt: file.completed_at ?? null,
    totalTestTime: file.total_test_time,
    tokensPerSecond: file.tokens_per_second,
    results: file.results
  }));

export function formatIssues(issues: readonly z.ZodIssue[]): string {
  return issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
