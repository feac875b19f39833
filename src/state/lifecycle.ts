import type { RunStatus } from '../types.js';

const TRANSITIONS: Record<RunStatus, readonly RunStatus[]> = {
  idle: ['loading_model', 'error'],
  loading_model: ['generating_code', 'saving_results', 'completed', 'error'],
  generating_code: ['generating_code', 'running_tests', 'saving_results', 'completed', 'error'],
  running_tests: ['generating_code', 'saving_results', 'completed', 'error'],
  saving_results: ['completed', 'error'],
  completed: [],
  error: []
};

export function isTerminalStatus(status: RunStatus): boolean {
  return status === 'completed' || status === 'error';
}

export function canTransition(from: RunStatus, to: RunStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function allowedTransitions(from: RunStatus): readonly RunStatus[] {
  return TRANSITIONS[from];
}
