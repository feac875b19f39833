import { describe, expect, test } from 'vitest';
import { allowedTransitions, canTransition, isTerminalStatus } from '../state/lifecycle.js';
import { RUN_STATUSES } from '../types.js';

describe('run status machine', () => {
  test('follows the question loop', () => {
    expect(canTransition('idle', 'loading_model')).toBe(true);
    expect(canTransition('loading_model', 'generating_code')).toBe(true);
    expect(canTransition('generating_code', 'running_tests')).toBe(true);
    expect(canTransition('running_tests', 'generating_code')).toBe(true);
    expect(canTransition('running_tests', 'saving_results')).toBe(true);
    expect(canTransition('saving_results', 'completed')).toBe(true);
  });

  test('rejects skipping the model load', () => {
    expect(canTransition('idle', 'generating_code')).toBe(false);
    expect(canTransition('saving_results', 'running_tests')).toBe(false);
  });

  test('reaches error from every live status', () => {
    for (const status of RUN_STATUSES) {
      expect(canTransition(status, 'error')).toBe(!isTerminalStatus(status));
    }
  });

  test('terminal statuses have no way out', () => {
    expect(allowedTransitions('completed')).toEqual([]);
    expect(allowedTransitions('error')).toEqual([]);
    expect(isTerminalStatus('saving_results')).toBe(false);
  });
});
