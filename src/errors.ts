import type { ZodIssue } from 'zod';
import type { StateKind } from './types.js';

export type MonitorErrorCode = 'DATASET_LOAD' | 'LIFECYCLE' | 'STATE_WRITE' | 'STATE_INVALID';

export class MonitorError extends Error {
  constructor(
    readonly code: MonitorErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The dataset index could not be read; scoring cannot proceed without it. */
export class DatasetLoadError extends MonitorError {
  constructor(
    readonly datasetPath: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('DATASET_LOAD', message, options);
  }
}

/** A writer call arrived out of lifecycle order or with arguments that break an invariant. */
export class LifecycleError extends MonitorError {
  constructor(
    readonly operation: string,
    message: string
  ) {
    super('LIFECYCLE', `${operation}: ${message}`);
  }
}

export class StateWriteError extends MonitorError {
  constructor(
    readonly targetPath: string,
    options?: { cause?: unknown }
  ) {
    super('STATE_WRITE', `failed to write ${targetPath}: ${describeError(options?.cause)}`, options);
  }
}

export class StateValidationError extends MonitorError {
  constructor(
    readonly kind: StateKind,
    readonly sourcePath: string,
    message: string,
    readonly issues: readonly ZodIssue[] = []
  ) {
    super('STATE_INVALID', message);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function errnoCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
