import type { LauncherState, RunState } from '../types.js';

export interface Progress {
  readonly completed: number;
  readonly total: number;
  readonly percentage: number;
}

function toProgress(completed: number, total: number): Progress {
  return { completed, total, percentage: total > 0 ? (completed / total) * 100 : 0 };
}

export function runProgress(run: RunState): Progress {
  return toProgress(run.results.length, run.totalQuestions);
}

/** Progress across grid cells, independent of per-run question counts. */
export function launcherProgress(launcher: LauncherState): Progress {
  const completed = launcher.grid.filter((item) => item.completed).length;
  return toProgress(completed, launcher.grid.length);
}
