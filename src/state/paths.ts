import path from 'path';
import type { StateKind, StatePaths } from '../types.js';

export const STATE_DIR_NAME = '.tui_state';
export const RESULTS_DIR_NAME = 'results';
export const RUN_STATE_FILE = 'run_state.json';
export const LAUNCHER_STATE_FILE = 'launcher_state.json';
export const CHECKPOINT_FILE = 'checkpoint.json';
export const TEMP_SUFFIX = '.tmp';

export function resolveStatePaths(baseDir: string, resultsDir?: string): StatePaths {
  const base = path.resolve(baseDir);
  const stateDir = path.join(base, STATE_DIR_NAME);
  return {
    baseDir: base,
    stateDir,
    runStatePath: path.join(stateDir, RUN_STATE_FILE),
    launcherStatePath: path.join(stateDir, LAUNCHER_STATE_FILE),
    checkpointPath: path.join(stateDir, CHECKPOINT_FILE),
    resultsDir: resultsDir ? path.resolve(resultsDir) : path.join(base, RESULTS_DIR_NAME)
  };
}

export function documentPath(paths: StatePaths, kind: Exclude<StateKind, 'results'>): string {
  switch (kind) {
    case 'run':
      return paths.runStatePath;
    case 'launcher':
      return paths.launcherStatePath;
    case 'checkpoint':
      return paths.checkpointPath;
  }
}

/** Maps a changed file to the state kind it feeds, or undefined for files the monitor ignores. */
export function classifyPath(paths: StatePaths, filePath: string): StateKind | undefined {
  const resolved = path.resolve(filePath);
  if (resolved.endsWith(TEMP_SUFFIX)) return undefined;
  if (resolved === paths.runStatePath) return 'run';
  if (resolved === paths.launcherStatePath) return 'launcher';
  if (resolved === paths.checkpointPath) return 'checkpoint';
  if (path.dirname(resolved) === paths.resultsDir && resolved.endsWith('.json')) return 'results';
  return undefined;
}

export function safeFileToken(value: string): string {
  return value.replace(/[:/\\\s]+/g, '_');
}
