import fs from 'fs/promises';
import { LifecycleError, StateValidationError, StateWriteError, errnoCode } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { resolveStatePaths } from '../state/paths.js';
import { CHECKPOINT_SCHEMA, formatIssues } from '../state/schemas.js';
import {
  STATE_DOCUMENT_VERSION,
  SYSTEM_CLOCK,
  type Checkpoint,
  type Clock,
  type GridItem,
  type LauncherState,
  type StatePaths
} from '../types.js';
import type { WriteOutcome } from './outcome.js';
import { SerialWriteQueue } from './writeQueue.js';

export type GridSkip = (model: string, architecture: string) => boolean;

/** Cloud-hosted models only run the single-agent architecture. */
export const skipCloudMultiAgent: GridSkip = (model, architecture) =>
  architecture === 'multi-agent' && model.toLowerCase().includes('cloud');

export function buildGrid(
  models: readonly string[],
  architectures: readonly string[],
  skip?: GridSkip
): GridItem[] {
  const grid: GridItem[] = [];
  for (const model of models) {
    for (const architecture of architectures) {
      if (skip?.(model, architecture)) continue;
      grid.push({ model, architecture, completed: false });
    }
  }
  return grid;
}

export async function readCheckpoint(paths: StatePaths): Promise<Checkpoint | undefined> {
  let contents: string;
  try {
    contents = await fs.readFile(paths.checkpointPath, 'utf8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    throw new StateValidationError(
      'checkpoint',
      paths.checkpointPath,
      `checkpoint is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  const parsed = CHECKPOINT_SCHEMA.safeParse(raw);
  if (!parsed.success) {
    throw new StateValidationError(
      'checkpoint',
      paths.checkpointPath,
      `checkpoint failed validation: ${formatIssues(parsed.error.issues)}`,
      parsed.error.issues
    );
  }
  return parsed.data;
}

export interface LauncherStateWriterOptions {
  readonly baseDir: string;
  readonly logger?: Logger;
  readonly clock?: Clock;
  /** Completions between checkpoint writes. */
  readonly checkpointEvery?: number;
}

export interface StartGridOptions {
  readonly resumeFrom?: Checkpoint;
}

export interface CompleteItemOptions {
  readonly score?: number;
  readonly resultFile?: string;
}

type LauncherOutcome = WriteOutcome<LauncherState>;

function firstPending(grid: readonly GridItem[]): number {
  return grid.findIndex((item) => !item.completed);
}

/** Index of the last item in the unbroken completed prefix, -1 when the first is pending. */
function completedPrefix(grid: readonly GridItem[]): number {
  const pending = firstPending(grid);
  return (pending === -1 ? grid.length : pending) - 1;
}

export class LauncherStateWriter {
  readonly paths: StatePaths;
  private current?: LauncherState;
  private sinceCheckpoint = 0;
  private readonly checkpointEvery: number;
  private readonly queue: SerialWriteQueue;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(options: LauncherStateWriterOptions) {
    this.paths = resolveStatePaths(options.baseDir);
    this.logger = options.logger ?? createLogger('launcher-writer');
    this.clock = options.clock ?? SYSTEM_CLOCK;
    this.checkpointEvery = Math.max(1, Math.floor(options.checkpointEvery ?? 1));
    this.queue = new SerialWriteQueue(this.logger);
  }

  get state(): LauncherState | undefined {
    return this.current;
  }

  startGrid(
    items: readonly Pick<GridItem, 'model' | 'architecture'>[],
    options: StartGridOptions = {}
  ): Promise<LauncherOutcome> {
    const resume = options.resumeFrom;
    if (resume && resume.totalItems !== items.length) {
      return this.reject(
        'startGrid',
        `checkpoint covers ${resume.totalItems} items but the grid has ${items.length}`
      );
    }
    const lastDone = resume?.lastCompletedIndex ?? -1;
    const grid = items.map(
      (item, index): GridItem => ({
        model: item.model,
        architecture: item.architecture,
        completed: index <= lastDone
      })
    );
    this.sinceCheckpoint = 0;
    this.current = {
      version: STATE_DOCUMENT_VERSION,
      grid,
      currentIndex: lastDone + 1,
      startedAt: this.timestamp(),
      finishedAt: null
    };
    this.logger.info({ items: grid.length, resumedThrough: lastDone }, 'launcher.started');
    return this.queue.write(this.paths.launcherStatePath, this.current);
  }

  startItem(index: number): Promise<LauncherOutcome> {
    const launcher = this.current;
    if (!launcher || launcher.finishedAt !== null) {
      return this.reject('startItem', 'no grid in progress');
    }
    if (!Number.isInteger(index) || index < 0 || index >= launcher.grid.length) {
      return this.reject('startItem', `index ${index} outside grid of ${launcher.grid.length}`);
    }
    if (launcher.grid[index]?.completed) {
      return this.reject('startItem', `item ${index} already completed`);
    }
    this.current = { ...launcher, currentIndex: index };
    return this.queue.write(this.paths.launcherStatePath, this.current);
  }

  async completeItem(index: number, options: CompleteItemOptions = {}): Promise<LauncherOutcome> {
    const launcher = this.current;
    if (!launcher || launcher.finishedAt !== null) {
      return this.reject('completeItem', 'no grid in progress');
    }
    const item = launcher.grid[index];
    if (!Number.isInteger(index) || !item) {
      return this.reject('completeItem', `index ${index} outside grid of ${launcher.grid.length}`);
    }

    const grid = launcher.grid.map(
      (existing, position): GridItem =>
        position === index
          ? {
              ...existing,
              completed: true,
              ...(options.score !== undefined ? { score: options.score } : {}),
              ...(options.resultFile !== undefined ? { resultFile: options.resultFile } : {})
            }
          : existing
    );
    const pending = firstPending(grid);
    this.current = { ...launcher, grid, currentIndex: pending === -1 ? grid.length : pending };
    const written = await this.queue.write(this.paths.launcherStatePath, this.current);
    if (!written.ok) return written;

    this.sinceCheckpoint += 1;
    if (this.sinceCheckpoint >= this.checkpointEvery) {
      const saved = await this.saveCheckpoint();
      if (!saved.ok) return saved;
    }
    return written;
  }

  async finish(): Promise<LauncherOutcome> {
    const launcher = this.current;
    if (!launcher || launcher.finishedAt !== null) {
      return this.reject('finish', 'no grid in progress');
    }
    this.current = { ...launcher, finishedAt: this.timestamp() };
    const written = await this.queue.write(this.paths.launcherStatePath, this.current);
    if (!written.ok) return written;
    const saved = await this.saveCheckpoint();
    if (!saved.ok) return saved;
    this.logger.info(
      { completed: launcher.grid.filter((entry) => entry.completed).length, items: launcher.grid.length },
      'launcher.finished'
    );
    return written;
  }

  nextPendingIndex(): number {
    return this.current ? firstPending(this.current.grid) : -1;
  }

  clearCheckpoint(): Promise<WriteOutcome<undefined>> {
    const target = this.paths.checkpointPath;
    return this.queue.run(async (): Promise<WriteOutcome<undefined>> => {
      try {
        await fs.rm(target, { force: true });
        return { ok: true, state: undefined };
      } catch (error) {
        const failure = new StateWriteError(target, { cause: error });
        this.logger.error({ err: failure }, 'checkpoint.clear.failed');
        return { ok: false, error: failure };
      }
    });
  }

  flush(): Promise<void> {
    return this.queue.drain();
  }

  private saveCheckpoint(): Promise<WriteOutcome<Checkpoint>> {
    const grid = this.current?.grid ?? [];
    this.sinceCheckpoint = 0;
    const checkpoint: Checkpoint = {
      version: STATE_DOCUMENT_VERSION,
      lastCompletedIndex: completedPrefix(grid),
      totalItems: grid.length,
      savedAt: this.timestamp()
    };
    return this.queue.write(this.paths.checkpointPath, checkpoint);
  }

  private timestamp(): string {
    return new Date(this.clock.now()).toISOString();
  }

  private reject(operation: string, message: string): Promise<LauncherOutcome> {
    const error = new LifecycleError(operation, message);
    this.logger.warn({ operation, reason: message }, 'launcher.lifecycle.violation');
    return Promise.resolve({ ok: false, error });
  }
}
