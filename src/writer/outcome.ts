import type { LifecycleError, StateWriteError } from '../errors.js';

export type WriteOutcome<T> =
  | { readonly ok: true; readonly state: T }
  | { readonly ok: false; readonly error: LifecycleError | StateWriteError };
