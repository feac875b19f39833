import fs from 'fs/promises';
import path from 'path';
import type { z } from 'zod';
import type { DifficultyLookup } from '../dataset/datasetIndex.js';
import { LifecycleError, StateValidationError, describeError, errnoCode } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import type { MonitorMetrics, ReconcileOutcome } from '../metrics/monitor.js';
import { documentPath, resolveStatePaths } from '../state/paths.js';
import { readJsonWithRetry } from '../state/readRetry.js';
import {
  CHECKPOINT_SCHEMA,
  LAUNCHER_STATE_SCHEMA,
  RUN_STATE_SCHEMA,
  formatIssues
} from '../state/schemas.js';
import {
  STATE_KINDS,
  SYSTEM_CLOCK,
  type Checkpoint,
  type Clock,
  type CompletedRunSummary,
  type LauncherState,
  type ReadRetryOptions,
  type RunState,
  type StateKind,
  type StatePaths
} from '../types.js';
import { ReconcileQueue, fingerprint } from './reconciler.js';
import { listResultFiles, loadCompletedRuns } from './resultsLoader.js';
import { ListenerSet, type Listener } from './subscribers.js';
import { watchStateFiles, type StateWatcher, type StateWatcherHandlers } from './watcher.js';

export const DEFAULT_POLL_INTERVAL_MS = 500;
export const DEFAULT_READ_RETRY: ReadRetryOptions = { attempts: 3, backoffMs: 25 };

export interface LoadableIndex extends DifficultyLookup {
  load(): Promise<void>;
}

export interface StateManagerOptions {
  readonly baseDir: string;
  readonly resultsDir?: string;
  readonly datasetIndex: LoadableIndex;
  readonly pollIntervalMs?: number;
  readonly readRetry?: ReadRetryOptions;
  /** Filesystem notifications on top of polling; polling always runs. */
  readonly watch?: boolean;
  readonly logger?: Logger;
  readonly metrics?: MonitorMetrics;
  readonly clock?: Clock;
  readonly createWatcher?: (paths: StatePaths, handlers: StateWatcherHandlers) => StateWatcher;
  readonly readFile?: (filePath: string) => Promise<string>;
}

type DocumentKind = Exclude<StateKind, 'results'>;

interface DocumentSlot<T> {
  readonly kind: DocumentKind;
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  readonly listeners: ListenerSet<T>;
  value?: T;
  print?: string;
}

function createSlot<T>(
  kind: DocumentKind,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): DocumentSlot<T> {
  return { kind, schema, listeners: new ListenerSet<T>() };
}

async function statSignature(filePath: string): Promise<string> {
  try {
    const stats = await fs.stat(filePath);
    return `${stats.mtimeMs}:${stats.size}:${stats.ino}`;
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return 'missing';
    throw error;
  }
}

/**
 * Consumer side of the state channel. Keeps the last valid copy of each document and tells
 * subscribers when one actually changes. Notifications come from a filesystem watcher when
 * it works and from a poll loop that always runs; both feed a single serial queue.
 */
export class StateManager {
  readonly paths: StatePaths;
  private readonly run = createSlot<RunState>('run', RUN_STATE_SCHEMA);
  private readonly launcher = createSlot<LauncherState>('launcher', LAUNCHER_STATE_SCHEMA);
  private readonly checkpointSlot = createSlot<Checkpoint>('checkpoint', CHECKPOINT_SCHEMA);
  private results: readonly CompletedRunSummary[] = [];
  private resultsPrint?: string;
  /** Result file path → summary from its last good read. */
  private resultSources: ReadonlyMap<string, CompletedRunSummary> = new Map();
  private readonly resultsListeners = new ListenerSet<readonly CompletedRunSummary[]>();
  private readonly errorListeners = new ListenerSet<StateValidationError>();
  /** Source path → raw content of the last version reported as invalid. */
  private readonly reported = new Map<string, string>();
  private readonly signatures = new Map<StateKind, string>();
  private readonly queue: ReconcileQueue;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly pollIntervalMs: number;
  private readonly readRetry: ReadRetryOptions;
  private watcher?: StateWatcher;
  private interval?: NodeJS.Timeout;
  private starting?: Promise<void>;
  private stopping?: Promise<void>;
  private polling = false;
  private stopped = false;

  constructor(private readonly options: StateManagerOptions) {
    this.paths = resolveStatePaths(options.baseDir, options.resultsDir);
    this.logger = options.logger ?? createLogger('state-manager');
    this.clock = options.clock ?? SYSTEM_CLOCK;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.readRetry = options.readRetry ?? DEFAULT_READ_RETRY;
    this.queue = new ReconcileQueue(
      (kind) => this.reconcile(kind),
      (kind, error) => this.logger.error({ kind, err: error }, 'monitor.reconcile.failed')
    );
  }

  get runState(): RunState | undefined {
    return this.run.value;
  }

  get launcherState(): LauncherState | undefined {
    return this.launcher.value;
  }

  get checkpoint(): Checkpoint | undefined {
    return this.checkpointSlot.value;
  }

  get completedRuns(): readonly CompletedRunSummary[] {
    return this.results;
  }

  get isWatching(): boolean {
    return this.watcher !== undefined;
  }

  onRunStateChange(listener: Listener<RunState>): () => void {
    return this.run.listeners.add(listener);
  }

  onLauncherStateChange(listener: Listener<LauncherState>): () => void {
    return this.launcher.listeners.add(listener);
  }

  onCheckpointChange(listener: Listener<Checkpoint>): () => void {
    return this.checkpointSlot.listeners.add(listener);
  }

  onResultsChange(listener: Listener<readonly CompletedRunSummary[]>): () => void {
    return this.resultsListeners.add(listener);
  }

  onError(listener: Listener<StateValidationError>): () => void {
    return this.errorListeners.add(listener);
  }

  start(): Promise<void> {
    if (this.stopped) {
      return Promise.reject(new LifecycleError('start', 'state manager already stopped'));
    }
    if (!this.starting) {
      this.starting = this.startOnce();
    }
    return this.starting;
  }

  /** Reconciles every source now; subscribers still only hear about real changes. */
  async pollForChanges(): Promise<void> {
    await Promise.all(STATE_KINDS.map((kind) => this.queue.schedule(kind)));
  }

  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.stopOnce();
    }
    return this.stopping;
  }

  private async startOnce(): Promise<void> {
    await this.options.datasetIndex.load();
    await fs.mkdir(this.paths.stateDir, { recursive: true });
    await fs.mkdir(this.paths.resultsDir, { recursive: true });
    if (this.stopped) return;

    await this.captureSignatures();
    await this.pollForChanges();
    if (this.stopped) return;

    if (this.options.watch ?? true) {
      this.startWatcher();
    }
    this.interval = setInterval(() => {
      this.pollTick().catch((error: unknown) => {
        this.logger.error({ err: error }, 'monitor.poll.failed');
      });
    }, this.pollIntervalMs);
    this.logger.info(
      {
        stateDir: this.paths.stateDir,
        resultsDir: this.paths.resultsDir,
        watching: this.isWatching,
        pollIntervalMs: this.pollIntervalMs
      },
      'monitor.started'
    );
  }

  private startWatcher(): void {
    const handlers: StateWatcherHandlers = {
      onChange: (kind) => {
        this.queue.schedule(kind).catch((error: unknown) => {
          this.logger.error({ kind, err: error }, 'monitor.reconcile.failed');
        });
      },
      onError: (error) => {
        this.logger.warn({ err: error }, 'monitor.watch.degraded');
      }
    };
    try {
      const create = this.options.createWatcher ?? watchStateFiles;
      this.watcher = create(this.paths, handlers);
    } catch (error) {
      this.logger.warn({ reason: describeError(error) }, 'monitor.watch.degraded');
    }
  }

  private async stopOnce(): Promise<void> {
    this.stopped = true;
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = undefined;
    }
    const watcher = this.watcher;
    this.watcher = undefined;
    if (watcher) {
      try {
        await watcher.close();
      } catch (error) {
        this.logger.warn({ reason: describeError(error) }, 'monitor.watch.close_failed');
      }
    }
    await this.queue.close();
    this.logger.info('monitor.stopped');
  }

  private async signatureOf(kind: StateKind): Promise<string> {
    if (kind !== 'results') {
      return statSignature(documentPath(this.paths, kind));
    }
    const files = await listResultFiles(this.paths.resultsDir);
    const parts = await Promise.all(
      files.map(async (filePath) => `${path.basename(filePath)}@${await statSignature(filePath)}`)
    );
    return parts.join('|');
  }

  private async captureSignatures(): Promise<void> {
    for (const kind of STATE_KINDS) {
      this.signatures.set(kind, await this.signatureOf(kind));
    }
  }

  private async pollTick(): Promise<void> {
    if (this.polling || this.stopped) return;
    this.polling = true;
    try {
      const changed: StateKind[] = [];
      for (const kind of STATE_KINDS) {
        const signature = await this.signatureOf(kind);
        if (signature !== this.signatures.get(kind)) {
          this.signatures.set(kind, signature);
          changed.push(kind);
        }
      }
      await Promise.all(changed.map((kind) => this.queue.schedule(kind)));
    } finally {
      this.polling = false;
    }
  }

  private reconcile(kind: StateKind): Promise<void> {
    switch (kind) {
      case 'run':
        return this.reconcileDocument(this.run);
      case 'launcher':
        return this.reconcileDocument(this.launcher);
      case 'checkpoint':
        return this.reconcileDocument(this.checkpointSlot);
      case 'results':
        return this.reconcileResults();
    }
  }

  private async reconcileDocument<T>(slot: DocumentSlot<T>): Promise<void> {
    const sourcePath = documentPath(this.paths, slot.kind);
    const outcome = await readJsonWithRetry(sourcePath, {
      ...this.readRetry,
      readFile: this.options.readFile,
      onRetry: (error, attempt) => {
        this.options.metrics?.recordReadRetry(slot.kind);
        this.logger.debug({ kind: slot.kind, attempt, reason: error.message }, 'monitor.read.retry');
      }
    });

    switch (outcome.status) {
      case 'missing':
        this.record(slot.kind, 'missing');
        return;
      case 'unavailable':
        this.logger.warn({ kind: slot.kind, reason: outcome.error.message }, 'monitor.read.unavailable');
        this.signatures.delete(slot.kind);
        this.record(slot.kind, 'unavailable');
        return;
      case 'unparsable':
        await this.reportInvalid(
          new StateValidationError(
            slot.kind,
            sourcePath,
            `${slot.kind} state is not valid JSON: ${outcome.error.message}`
          ),
          outcome.raw
        );
        return;
      case 'ok':
        break;
    }

    const parsed = slot.schema.safeParse(outcome.value);
    if (!parsed.success) {
      await this.reportInvalid(
        new StateValidationError(
          slot.kind,
          sourcePath,
          `${slot.kind} state failed validation: ${formatIssues(parsed.error.issues)}`,
          parsed.error.issues
        ),
        outcome.raw
      );
      return;
    }
    this.reported.delete(sourcePath);

    const print = fingerprint(parsed.data);
    if (print === slot.print) {
      this.record(slot.kind, 'unchanged');
      return;
    }
    slot.value = parsed.data;
    slot.print = print;
    this.record(slot.kind, 'changed');
    await this.dispatch(slot.kind, slot.listeners, parsed.data);
  }

  private async reconcileResults(): Promise<void> {
    const load = await loadCompletedRuns(
      this.paths.resultsDir,
      this.options.datasetIndex,
      {
        ...this.readRetry,
        readFile: this.options.readFile,
        onRetry: () => this.options.metrics?.recordReadRetry('results')
      },
      this.resultSources
    );

    const failing = new Set([...load.failures.map((failure) => failure.filePath), ...load.unavailable]);
    for (const reportedPath of [...this.reported.keys()]) {
      if (path.dirname(reportedPath) === this.paths.resultsDir && !failing.has(reportedPath)) {
        this.reported.delete(reportedPath);
      }
    }
    for (const failure of load.failures) {
      await this.reportInvalid(failure.error, failure.raw);
    }

    this.resultSources = load.sources;
    if (load.unavailable.length > 0) {
      this.signatures.delete('results');
      this.logger.warn({ files: load.unavailable }, 'monitor.read.unavailable');
    }
    const unresolved = load.unavailable.filter((filePath) => !load.sources.has(filePath));
    if (unresolved.length > 0) {
      this.record('results', 'unavailable');
      return;
    }

    const print = fingerprint(load.summaries);
    if (print === this.resultsPrint) {
      this.record('results', 'unchanged');
      return;
    }
    this.results = load.summaries;
    this.resultsPrint = print;
    this.record('results', 'changed');
    await this.dispatch('results', this.resultsListeners, load.summaries);
  }

  private async reportInvalid(error: StateValidationError, raw: string): Promise<void> {
    this.record(error.kind, 'invalid');
    if (this.reported.get(error.sourcePath) === raw) return;
    this.reported.set(error.sourcePath, raw);
    this.options.metrics?.recordInvalid(error.kind);
    this.logger.warn(
      { kind: error.kind, path: error.sourcePath, reason: error.message },
      'monitor.document.invalid'
    );
    await this.errorListeners.emit(error, (failure) => {
      this.logger.error({ err: failure }, 'monitor.error_listener.failed');
    });
  }

  private async dispatch<T>(kind: StateKind, listeners: ListenerSet<T>, value: T): Promise<void> {
    this.options.metrics?.recordDispatch(kind, this.clock.now());
    this.logger.debug({ kind, listeners: listeners.size }, 'monitor.dispatch');
    await listeners.emit(value, (error) => {
      this.logger.error({ kind, err: error }, 'monitor.subscriber.failed');
    });
  }

  private record(kind: StateKind, outcome: ReconcileOutcome): void {
    this.options.metrics?.recordReconcile(kind, outcome);
  }
}
