import stringifyStable from 'fast-json-stable-stringify';
import type { StateKind } from '../types.js';

export function fingerprint(value: unknown): string {
  return stringifyStable(value);
}

/**
 * Runs reconciliations one at a time. Scheduling a kind that is already waiting returns the
 * waiting job instead of queueing a second one, so event bursts collapse.
 */
export class ReconcileQueue {
  private tail: Promise<void> = Promise.resolve();
  private readonly waiting = new Map<StateKind, Promise<void>>();
  private closed = false;

  constructor(
    private readonly handler: (kind: StateKind) => Promise<void>,
    private readonly onFailure: (kind: StateKind, error: unknown) => void
  ) {}

  schedule(kind: StateKind): Promise<void> {
    if (this.closed) return Promise.resolve();
    const queued = this.waiting.get(kind);
    if (queued) return queued;

    const job = this.tail.then(async () => {
      this.waiting.delete(kind);
      if (this.closed) return;
      try {
        await this.handler(kind);
      } catch (error) {
        this.onFailure(kind, error);
      }
    });
    this.waiting.set(kind, job);
    this.tail = job;
    return job;
  }

  /** Rejects new work, skips jobs not yet started and waits for the running one. */
  close(): Promise<void> {
    this.closed = true;
    return this.tail;
  }
}
