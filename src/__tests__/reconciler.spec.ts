import { describe, expect, test, vi } from 'vitest';
import path from 'path';
import { ReconcileQueue, fingerprint } from '../manager/reconciler.js';
import { ListenerSet } from '../manager/subscribers.js';
import { classifyPath, resolveStatePaths, safeFileToken } from '../state/paths.js';
import type { StateKind } from '../types.js';

describe('ReconcileQueue', () => {
  test('runs jobs one at a time and collapses kinds already waiting', async () => {
    const calls: StateKind[] = [];
    let active = 0;
    let maxActive = 0;
    const queue = new ReconcileQueue(async (kind) => {
      active += 1;
      maxActive = Math.max(maxActive, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      calls.push(kind);
      active -= 1;
    }, vi.fn());

    await Promise.all([
      queue.schedule('run'),
      queue.schedule('run'),
      queue.schedule('results'),
      queue.schedule('run')
    ]);
    expect(calls).toEqual(['run', 'results']);
    expect(maxActive).toBe(1);
  });

  test('reports handler failures and keeps going', async () => {
    const onFailure = vi.fn();
    const handled: StateKind[] = [];
    const queue = new ReconcileQueue(async (kind) => {
      if (kind === 'run') throw new Error('read failed');
      handled.push(kind);
    }, onFailure);
    await queue.schedule('run');
    await queue.schedule('launcher');
    expect(onFailure).toHaveBeenCalledWith('run', expect.any(Error));
    expect(handled).toEqual(['launcher']);
  });

  test('skips waiting jobs once closed', async () => {
    const handler = vi.fn(async () => undefined);
    const queue = new ReconcileQueue(handler, vi.fn());
    const pending = queue.schedule('checkpoint');
    await queue.close();
    await pending;
    await queue.schedule('run');
    expect(handler).not.toHaveBeenCalled();
  });
});

describe('fingerprint', () => {
  test('ignores key order', () => {
    expect(fingerprint({ a: 1, b: [1, 2] })).toBe(fingerprint({ b: [1, 2], a: 1 }));
    expect(fingerprint({ a: 1 })).not.toBe(fingerprint({ a: 2 }));
  });
});

describe('ListenerSet', () => {
  test('calls listeners in registration order and honors unsubscribe', async () => {
    const listeners = new ListenerSet<number>();
    const seen: string[] = [];
    listeners.add((value) => {
      seen.push(`a${value}`);
    });
    const remove = listeners.add((value) => {
      seen.push(`b${value}`);
    });
    await listeners.emit(1, vi.fn());
    remove();
    await listeners.emit(2, vi.fn());
    expect(seen).toEqual(['a1', 'b1', 'a2']);
    expect(listeners.size).toBe(1);
  });
});

describe('state paths', () => {
  const paths = resolveStatePaths('/srv/bench');

  test('maps files to the kind they feed', () => {
    expect(classifyPath(paths, '/srv/bench/.tui_state/run_state.json')).toBe('run');
    expect(classifyPath(paths, '/srv/bench/.tui_state/launcher_state.json')).toBe('launcher');
    expect(classifyPath(paths, '/srv/bench/.tui_state/checkpoint.json')).toBe('checkpoint');
    expect(classifyPath(paths, path.join(paths.resultsDir, 'm_simple.json'))).toBe('results');
  });

  test('ignores temp files and unrelated names', () => {
    expect(classifyPath(paths, '/srv/bench/.tui_state/.run_state.json.42.1.tmp')).toBeUndefined();
    expect(classifyPath(paths, '/srv/bench/.tui_state/notes.txt')).toBeUndefined();
    expect(classifyPath(paths, path.join(paths.resultsDir, 'nested', 'x.json'))).toBeUndefined();
  });

  test('makes model names safe for file names', () => {
    expect(safeFileToken('org/model:7b q4')).toBe('org_model_7b_q4');
  });
});
