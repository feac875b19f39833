import fs from 'fs/promises';
import type { DifficultyLookup } from '../dataset/datasetIndex.js';
import { normalizeDifficulty } from '../dataset/datasetIndex.js';
import { LifecycleError, StateWriteError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { canTransition, isTerminalStatus } from '../state/lifecycle.js';
import { resolveStatePaths } from '../state/paths.js';
import {
  STATE_DOCUMENT_VERSION,
  SYSTEM_CLOCK,
  type Clock,
  type QuestionResult,
  type QuestionState,
  type RunState,
  type RunStatus,
  type StatePaths
} from '../types.js';
import type { WriteOutcome } from './outcome.js';
import { writeResultFile } from './resultsWriter.js';
import { SerialWriteQueue } from './writeQueue.js';

export interface RunStateWriterOptions {
  readonly baseDir: string;
  readonly resultsDir?: string;
  readonly logger?: Logger;
  readonly clock?: Clock;
  /** Also write the run's result file when it finishes successfully. */
  readonly writeResults?: boolean;
  /** Used to score the result file; defaults to each result's own tag. */
  readonly index?: DifficultyLookup;
}

export interface StartRunOptions {
  readonly resumedResults?: readonly QuestionResult[];
}

export interface QuestionOutcome {
  readonly passedTests: number;
  readonly totalTests: number;
  readonly successRate: number;
  readonly totalTime: number;
  readonly codeGenerationTime?: number;
  readonly error?: string;
}

export interface FinishRunOptions {
  readonly success?: boolean;
  readonly error?: string;
}

type RunOutcome = WriteOutcome<RunState>;

function idleState(): RunState {
  return {
    version: STATE_DOCUMENT_VERSION,
    model: '',
    architecture: '',
    status: 'idle',
    startedAt: null,
    totalQuestions: 0,
    currentQuestion: null,
    totalInputTokens: 0,
    totalOutputTokens: 0,
    elapsedSeconds: 0,
    results: []
  };
}

function isCount(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

/**
 * Producer side of the run-state channel. Each call validates against the in-memory state,
 * then queues a full-document atomic write so files land in call order.
 */
export class RunStateWriter {
  readonly paths: StatePaths;
  private current: RunState = idleState();
  private startedMs = 0;
  private frozen = false;
  private readonly queue: SerialWriteQueue;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(private readonly options: RunStateWriterOptions) {
    this.paths = resolveStatePaths(options.baseDir, options.resultsDir);
    this.logger = options.logger ?? createLogger('run-writer');
    this.clock = options.clock ?? SYSTEM_CLOCK;
    this.queue = new SerialWriteQueue(this.logger);
  }

  get state(): RunState {
    return this.current;
  }

  startRun(
    model: string,
    architecture: string,
    totalQuestions: number,
    options: StartRunOptions = {}
  ): Promise<RunOutcome> {
    if (!isCount(totalQuestions)) {
      return this.reject('startRun', `totalQuestions must be a non-negative integer, got ${totalQuestions}`);
    }
    const resumed = options.resumedResults ?? [];
    if (resumed.length > totalQuestions) {
      return this.reject('startRun', `${resumed.length} resumed results exceed ${totalQuestions} questions`);
    }

    this.startedMs = this.clock.now();
    this.frozen = false;
    this.current = {
      ...idleState(),
      model,
      architecture,
      status: 'loading_model',
      startedAt: this.timestamp(),
      totalQuestions,
      totalInputTokens: resumed.reduce((sum, result) => sum + result.inputTokens, 0),
      totalOutputTokens: resumed.reduce((sum, result) => sum + result.outputTokens, 0),
      results: [...resumed]
    };
    this.logger.info(
      { model, architecture, totalQuestions, resumed: resumed.length },
      'run.started'
    );
    return this.commit();
  }

  modelLoaded(): Promise<RunOutcome> {
    const violation = this.checkTransition('modelLoaded', 'generating_code');
    if (violation) return violation;
    if (this.current.status !== 'loading_model') {
      return this.reject('modelLoaded', `model already loaded (status ${this.current.status})`);
    }
    this.current = { ...this.current, status: 'generating_code' };
    return this.commit();
  }

  startQuestion(
    questionId: string,
    difficulty: string,
    index: number,
    total: number,
    title = ''
  ): Promise<RunOutcome> {
    const violation = this.checkTransition('startQuestion', 'generating_code');
    if (violation) return violation;
    if (!Number.isInteger(index) || index < 1 || index > total) {
      return this.reject('startQuestion', `index ${index} outside [1, ${total}]`);
    }
    if (total !== this.current.totalQuestions) {
      return this.reject(
        'startQuestion',
        `total ${total} differs from run total ${this.current.totalQuestions}`
      );
    }

    const question: QuestionState = {
      questionId,
      difficulty: normalizeDifficulty(difficulty) ?? 'unknown',
      title,
      index,
      total,
      status: 'generating_code',
      startedAt: this.timestamp(),
      inputTokens: 0,
      outputTokens: 0,
      currentTest: 0,
      totalTests: 0,
      passedTests: 0
    };
    this.current = { ...this.current, status: 'generating_code', currentQuestion: question };
    return this.commit();
  }

  updateTokens(inputDelta: number, outputDelta: number): Promise<RunOutcome> {
    const question = this.current.currentQuestion;
    if (this.frozen || !question) {
      return this.reject('updateTokens', 'no question in progress');
    }
    if (!isCount(inputDelta) || !isCount(outputDelta)) {
      return this.reject(
        'updateTokens',
        `token deltas must be non-negative integers, got ${inputDelta}/${outputDelta}`
      );
    }
    this.current = {
      ...this.current,
      totalInputTokens: this.current.totalInputTokens + inputDelta,
      totalOutputTokens: this.current.totalOutputTokens + outputDelta,
      currentQuestion: {
        ...question,
        inputTokens: question.inputTokens + inputDelta,
        outputTokens: question.outputTokens + outputDelta
      }
    };
    return this.commit();
  }

  startTests(totalTests: number): Promise<RunOutcome> {
    const question = this.current.currentQuestion;
    if (this.frozen || !question) {
      return this.reject('startTests', 'no question in progress');
    }
    const violation = this.checkTransition('startTests', 'running_tests');
    if (violation) return violation;
    if (!isCount(totalTests)) {
      return this.reject('startTests', `totalTests must be a non-negative integer, got ${totalTests}`);
    }
    this.current = {
      ...this.current,
      status: 'running_tests',
      currentQuestion: {
        ...question,
        status: 'running_tests',
        totalTests,
        currentTest: 0,
        passedTests: 0
      }
    };
    return this.commit();
  }

  recordTestProgress(currentTest: number, passedTests: number): Promise<RunOutcome> {
    const question = this.current.currentQuestion;
    if (this.frozen || !question || this.current.status !== 'running_tests') {
      return this.reject('recordTestProgress', 'no tests running');
    }
    if (
      !isCount(currentTest) ||
      !isCount(passedTests) ||
      passedTests > currentTest ||
      currentTest > question.totalTests
    ) {
      return this.reject(
        'recordTestProgress',
        `invalid progress ${passedTests}/${currentTest} of ${question.totalTests}`
      );
    }
    this.current = { ...this.current, currentQuestion: { ...question, currentTest, passedTests } };
    return this.commit();
  }

  finishQuestion(outcome: QuestionOutcome): Promise<RunOutcome> {
    const question = this.current.currentQuestion;
    if (this.frozen || !question) {
      return this.reject('finishQuestion', 'no question in progress');
    }
    if (outcome.successRate < 0 || outcome.successRate > 1) {
      return this.reject('finishQuestion', `successRate ${outcome.successRate} outside [0, 1]`);
    }
    if (!isCount(outcome.passedTests) || !isCount(outcome.totalTests) || outcome.totalTime < 0) {
      return this.reject('finishQuestion', 'test counts and time must be non-negative');
    }

    const result: QuestionResult = {
      questionId: question.questionId,
      difficulty: question.difficulty,
      passedTests: outcome.passedTests,
      totalTests: outcome.totalTests,
      successRate: outcome.successRate,
      totalTime: outcome.totalTime,
      codeGenerationTime: outcome.codeGenerationTime ?? 0,
      inputTokens: question.inputTokens,
      outputTokens: question.outputTokens,
      ...(outcome.error !== undefined ? { error: outcome.error } : {})
    };
    const results = [...this.current.results, result];
    const next: RunStatus =
      results.length >= this.current.totalQuestions ? 'saving_results' : 'generating_code';
    const violation = this.checkTransition('finishQuestion', next);
    if (violation) return violation;

    this.current = { ...this.current, status: next, currentQuestion: null, results };
    return this.commit();
  }

  async finishRun(options: FinishRunOptions = {}): Promise<RunOutcome> {
    const success = options.success ?? true;
    const target: RunStatus = success ? 'completed' : 'error';
    const violation = this.checkTransition('finishRun', target);
    if (violation) return violation;

    if (success && this.options.writeResults) {
      if (this.current.status !== 'saving_results') {
        this.current = { ...this.current, status: 'saving_results', currentQuestion: null };
        const saving = await this.commit();
        if (!saving.ok) return saving;
      }
      try {
        const resultFile = await writeResultFile(
          this.paths.resultsDir,
          this.current,
          this.clock,
          this.options.index
        );
        this.logger.info({ resultFile }, 'run.results.written');
      } catch (error) {
        const failure = new StateWriteError(this.paths.resultsDir, { cause: error });
        this.logger.error({ err: failure }, 'run.results.failed');
        return { ok: false, error: failure };
      }
    }

    this.current = {
      ...this.current,
      status: target,
      currentQuestion: null,
      elapsedSeconds: this.elapsed(),
      ...(options.error !== undefined ? { error: options.error } : {})
    };
    this.frozen = true;
    this.logger.info(
      { model: this.current.model, architecture: this.current.architecture, status: target },
      'run.finished'
    );
    return this.queue.write(this.paths.runStatePath, this.current);
  }

  setError(message: string): Promise<RunOutcome> {
    return this.finishRun({ success: false, error: message });
  }

  /** Removes the run-state file and resets to idle. */
  clear(): Promise<RunOutcome> {
    this.current = idleState();
    this.frozen = false;
    const state = this.current;
    const target = this.paths.runStatePath;
    return this.queue.run(async (): Promise<RunOutcome> => {
      try {
        await fs.rm(target, { force: true });
      } catch (error) {
        const failure = new StateWriteError(target, { cause: error });
        this.logger.error({ err: failure }, 'run_state.clear.failed');
        return { ok: false, error: failure };
      }
      return { ok: true, state };
    });
  }

  /** Resolves once every queued write has landed. */
  flush(): Promise<void> {
    return this.queue.drain();
  }

  private timestamp(): string {
    return new Date(this.clock.now()).toISOString();
  }

  private elapsed(): number {
    if (this.current.startedAt === null) return 0;
    return Math.max(0, (this.clock.now() - this.startedMs) / 1_000);
  }

  private checkTransition(operation: string, to: RunStatus): Promise<RunOutcome> | undefined {
    const from = this.current.status;
    if (from === 'idle' && to !== 'error') {
      return this.reject(operation, 'no run started');
    }
    if (this.frozen || isTerminalStatus(from)) {
      return this.reject(operation, `run already finished (status ${from})`);
    }
    if (!canTransition(from, to)) {
      return this.reject(operation, `cannot move from ${from} to ${to}`);
    }
    return undefined;
  }

  private reject(operation: string, message: string): Promise<RunOutcome> {
    const error = new LifecycleError(operation, message);
    this.logger.warn({ operation, status: this.current.status, reason: message }, 'run.lifecycle.violation');
    return Promise.resolve({ ok: false, error });
  }

  private commit(): Promise<RunOutcome> {
    this.current = { ...this.current, elapsedSeconds: this.elapsed() };
    if (this.current.currentQuestion) {
      this.current = {
        ...this.current,
        currentQuestion: { ...this.current.currentQuestion, status: this.current.status }
      };
    }
    return this.queue.write(this.paths.runStatePath, this.current);
  }
}
