import fs from 'fs/promises';
import pRetry, { AbortError } from 'p-retry';
import { errnoCode } from '../errors.js';
import type { ReadRetryOptions } from '../types.js';

export type ReadOutcome =
  | { readonly status: 'ok'; readonly raw: string; readonly value: unknown }
  | { readonly status: 'missing' }
  | { readonly status: 'unavailable'; readonly error: Error }
  | { readonly status: 'unparsable'; readonly raw: string; readonly error: Error };

export interface ReadWithRetryOptions extends ReadRetryOptions {
  readonly onRetry?: (error: Error, attempt: number) => void;
  readonly readFile?: (filePath: string) => Promise<string>;
}

class EmptyDocumentError extends Error {
  constructor(filePath: string) {
    super(`${filePath} is empty`);
  }
}

class UnparsableDocumentError extends Error {
  constructor(
    readonly raw: string,
    cause: unknown
  ) {
    super(cause instanceof Error ? cause.message : 'invalid JSON', { cause });
  }
}

const defaultReadFile = (filePath: string): Promise<string> => fs.readFile(filePath, 'utf8');

/**
 * Reads and parses a JSON document, retrying I/O failures, empty reads and unparsable
 * content a bounded number of times. A missing file is not retried.
 */
export async function readJsonWithRetry(
  filePath: string,
  options: ReadWithRetryOptions
): Promise<ReadOutcome> {
  const readFile = options.readFile ?? defaultReadFile;
  try {
    const { raw, value } = await pRetry(
      async () => {
        let raw: string;
        try {
          raw = await readFile(filePath);
        } catch (error) {
          if (errnoCode(error) === 'ENOENT') {
            throw new AbortError(error instanceof Error ? error : String(error));
          }
          throw error;
        }
        if (raw.trim().length === 0) {
          throw new EmptyDocumentError(filePath);
        }
        try {
          return { raw, value: JSON.parse(raw) as unknown };
        } catch (error) {
          throw new UnparsableDocumentError(raw, error);
        }
      },
      {
        retries: Math.max(0, options.attempts - 1),
        minTimeout: options.backoffMs,
        factor: 2,
        randomize: false,
        onFailedAttempt: (error) => {
          if (error.retriesLeft > 0) {
            options.onRetry?.(error, error.attemptNumber);
          }
        }
      }
    );
    return { status: 'ok', raw, value };
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return { status: 'missing' };
    }
    if (error instanceof UnparsableDocumentError) {
      return { status: 'unparsable', raw: error.raw, error };
    }
    return {
      status: 'unavailable',
      error: error instanceof Error ? error : new Error(String(error))
    };
  }
}
