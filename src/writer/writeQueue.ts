import { StateWriteError } from '../errors.js';
import type { Logger } from '../logger.js';
import { writeJsonAtomic } from '../state/atomicWrite.js';
import type { WriteOutcome } from './outcome.js';

/** Chains document writes so renames land in the order they were requested. */
export class SerialWriteQueue {
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly logger: Logger) {}

  run<R>(task: () => Promise<R>): Promise<R> {
    const next = this.tail.then(task);
    this.tail = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }

  write<T>(targetPath: string, state: T): Promise<WriteOutcome<T>> {
    return this.run(async (): Promise<WriteOutcome<T>> => {
      try {
        await writeJsonAtomic(targetPath, state);
        return { ok: true, state };
      } catch (error) {
        const failure = new StateWriteError(targetPath, { cause: error });
        this.logger.error({ err: failure, path: targetPath }, 'state.write.failed');
        return { ok: false, error: failure };
      }
    });
  }

  drain(): Promise<void> {
    return this.tail;
  }
}
