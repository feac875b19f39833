export const DIFFICULTIES = ['easy', 'medium', 'hard'] as const;
export type Difficulty = (typeof DIFFICULTIES)[number];
export type DifficultyTag = Difficulty | 'unknown';

export const RUN_STATUSES = [
  'idle',
  'loading_model',
  'generating_code',
  'running_tests',
  'saving_results',
  'completed',
  'error'
] as const;
export type RunStatus = (typeof RUN_STATUSES)[number];

export const STATE_DOCUMENT_VERSION = 1;

export interface Clock {
  now(): number;
}

export const SYSTEM_CLOCK: Clock = { now: () => Date.now() };

export interface QuestionResult {
  readonly questionId: string;
  readonly difficulty: DifficultyTag;
  readonly passedTests: number;
  readonly totalTests: number;
  /** Fraction of tests passed, 0..1. */
  readonly successRate: number;
  /** Wall time spent on the question, seconds. */
  readonly totalTime: number;
  readonly codeGenerationTime: number;
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly error?: string;
}

export interface QuestionState {
  readonly questionId: string;
  readonly difficulty: DifficultyTag;
  readonly title: string;
  /** 1-based position within the run. */
  readonly index: number;
  readonly total: number;
  readonly status: RunStatus;
  readonly startedAt: string;
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly currentTest: number;
  readonly totalTests: number;
  readonly passedTests: number;
}

export interface RunState {
  readonly version: number;
  readonly model: string;
  readonly architecture: string;
  readonly status: RunStatus;
  readonly startedAt: string | null;
  readonly totalQuestions: number;
  readonly currentQuestion: QuestionState | null;
  readonly totalInputTokens: number;
  readonly totalOutputTokens: number;
  readonly elapsedSeconds: number;
  readonly results: readonly QuestionResult[];
  readonly error?: string;
}

export interface GridItem {
  readonly model: string;
  readonly architecture: string;
  readonly completed: boolean;
  readonly score?: number;
  readonly resultFile?: string;
}

export interface LauncherState {
  readonly version: number;
  readonly grid: readonly GridItem[];
  /** Index of the item currently running; equals grid.length once everything ran. */
  readonly currentIndex: number;
  readonly startedAt: string | null;
  readonly finishedAt: string | null;
}

export interface Checkpoint {
  readonly version: number;
  /** -1 when no grid item has completed yet. */
  readonly lastCompletedIndex: number;
  readonly totalItems: number;
  readonly savedAt: string;
}

export interface CompletedRunSummary {
  readonly key: string;
  readonly model: string;
  readonly architecture: string;
  readonly startedAt: string | null;
  readonly completedAt: string | null;
  readonly resultFile: string | null;
  readonly totalInputTokens: number;
  readonly totalOutputTokens: number;
  readonly score: number;
  readonly totalQuestions: number;
  readonly totalTime: number;
  readonly tokensPerSecond: number;
  readonly easyPercentage: number;
  readonly mediumPercentage: number;
  readonly hardPercentage: number;
  readonly totalPercentage: number;
  readonly easyTotal: number;
  readonly easyPassed: number;
  readonly mediumTotal: number;
  readonly mediumPassed: number;
  readonly hardTotal: number;
  readonly hardPassed: number;
  readonly totalPassed: number;
}

/** One question entry of a result file, normalized from the benchmark's snake_case output. */
export interface RunResultEntry {
  readonly questionId: string;
  readonly difficulty?: string;
  readonly successRate: number;
  readonly passedTests: number;
  readonly totalTests: number;
  readonly totalTime: number;
  readonly codeGenerationTime: number;
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly error?: string | null;
}

export interface RunResultInput {
  readonly model: string;
  readonly architecture: string;
  readonly startedAt: string | null;
  readonly completedAt: string | null;
  readonly totalTestTime: number;
  readonly tokensPerSecond: number;
  readonly results: readonly RunResultEntry[];
}

export type StateKind = 'run' | 'launcher' | 'checkpoint' | 'results';
export const STATE_KINDS: readonly StateKind[] = ['run', 'launcher', 'checkpoint', 'results'];

export interface StatePaths {
  readonly baseDir: string;
  readonly stateDir: string;
  readonly runStatePath: string;
  readonly launcherStatePath: string;
  readonly checkpointPath: string;
  readonly resultsDir: string;
}

export interface ReadRetryOptions {
  readonly attempts: number;
  readonly backoffMs: number;
}

export interface MonitorConfig {
  readonly paths: StatePaths;
  readonly datasetFile: string;
  readonly exportDir: string;
  readonly pollIntervalMs: number;
  readonly readRetry: ReadRetryOptions;
  readonly watchEnabled: boolean;
  readonly promPort: number;
  readonly logLevel: string;
}
