export { DatasetIndex, normalizeDifficulty } from './dataset/datasetIndex.js';
export type { DatasetIndexOptions, DifficultyLookup } from './dataset/datasetIndex.js';
export {
  DatasetLoadError,
  LifecycleError,
  MonitorError,
  StateValidationError,
  StateWriteError
} from './errors.js';
export type { MonitorErrorCode } from './errors.js';
export { createLogger, logger, silentLogger } from './logger.js';
export type { Logger } from './logger.js';
export { loadConfig } from './config.js';
export { StateManager, DEFAULT_POLL_INTERVAL_MS, DEFAULT_READ_RETRY } from './manager/stateManager.js';
export type { LoadableIndex, StateManagerOptions } from './manager/stateManager.js';
export { loadCompletedRuns } from './manager/resultsLoader.js';
export type { ResultsLoad, ResultsLoadFailure } from './manager/resultsLoader.js';
export type { Listener } from './manager/subscribers.js';
export { MonitorMetricsManager, createMonitorMetrics } from './metrics/monitor.js';
export type { MonitorMetrics, ReconcileOutcome } from './metrics/monitor.js';
export { buildResultsCsv, buildResultsMarkdown } from './reports/resultsTable.js';
export { writeFileAtomic, writeJsonAtomic } from './state/atomicWrite.js';
export { allowedTransitions, canTransition, isTerminalStatus } from './state/lifecycle.js';
export { resolveStatePaths } from './state/paths.js';
export {
  CHECKPOINT_SCHEMA,
  LAUNCHER_STATE_SCHEMA,
  RESULT_FILE_SCHEMA,
  RUN_STATE_SCHEMA
} from './state/schemas.js';
export { aggregateByDifficulty, weightedScore, DIFFICULTY_WEIGHTS } from './stats/difficulty.js';
export type { BucketStats, DifficultyStats, ScoredQuestion } from './stats/difficulty.js';
export { launcherProgress, runProgress } from './stats/progress.js';
export type { Progress } from './stats/progress.js';
export { summarizeRunResult, toRunResultInput } from './stats/summary.js';
export { RunStateWriter } from './writer/runStateWriter.js';
export type { FinishRunOptions, QuestionOutcome, RunStateWriterOptions } from './writer/runStateWriter.js';
export {
  LauncherStateWriter,
  buildGrid,
  readCheckpoint,
  skipCloudMultiAgent
} from './writer/launcherWriter.js';
export type { GridSkip, LauncherStateWriterOptions } from './writer/launcherWriter.js';
export { writeResultFile } from './writer/resultsWriter.js';
export type { WriteOutcome } from './writer/outcome.js';
export { DIFFICULTIES, RUN_STATUSES, STATE_KINDS } from './types.js';
export type {
  Checkpoint,
  Clock,
  CompletedRunSummary,
  Difficulty,
  DifficultyTag,
  GridItem,
  LauncherState,
  MonitorConfig,
  QuestionResult,
  QuestionState,
  RunState,
  RunStatus,
  StateKind,
  StatePaths
} from './types.js';
