import { watch, type FSWatcher } from 'chokidar';
import { classifyPath } from '../state/paths.js';
import type { StateKind, StatePaths } from '../types.js';

export interface StateWatcherHandlers {
  onChange(kind: StateKind, filePath: string): void;
  onError(error: unknown): void;
}

export interface StateWatcher {
  close(): Promise<void>;
}

/**
 * Watches the state and results directories, one level deep, and maps each event to the
 * kind of document it touched. Temp files and unrelated names are dropped here.
 */
export function watchStateFiles(paths: StatePaths, handlers: StateWatcherHandlers): StateWatcher {
  const watcher: FSWatcher = watch([paths.stateDir, paths.resultsDir], {
    ignoreInitial: true,
    depth: 0,
    persistent: true
  });

  const route = (filePath: string): void => {
    const kind = classifyPath(paths, filePath);
    if (kind) handlers.onChange(kind, filePath);
  };

  watcher.on('add', route);
  watcher.on('change', route);
  watcher.on('unlink', route);
  watcher.on('error', (error: unknown) => handlers.onError(error));

  return {
    close: () => watcher.close()
  };
}
