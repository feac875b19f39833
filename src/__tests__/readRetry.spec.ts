import { describe, expect, test, vi } from 'vitest';
import { readJsonWithRetry } from '../state/readRetry.js';

function errno(code: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(code);
  error.code = code;
  return error;
}

const FAST = { attempts: 3, backoffMs: 1 };

describe('readJsonWithRetry', () => {
  test('returns the parsed value', async () => {
    const outcome = await readJsonWithRetry('state.json', { ...FAST, readFile: async () => '{"a":1}' });
    expect(outcome).toEqual({ status: 'ok', raw: '{"a":1}', value: { a: 1 } });
  });

  test('does not retry a missing file', async () => {
    const readFile = vi.fn(async (): Promise<string> => {
      throw errno('ENOENT');
    });
    const outcome = await readJsonWithRetry('state.json', { ...FAST, readFile });
    expect(outcome).toEqual({ status: 'missing' });
    expect(readFile).toHaveBeenCalledTimes(1);
  });

  test('retries a torn read until the document parses', async () => {
    const reads = ['{"a":', '', '{"a":2}'];
    const onRetry = vi.fn();
    const readFile = vi.fn(async () => reads.shift() ?? '');
    const outcome = await readJsonWithRetry('state.json', { ...FAST, readFile, onRetry });
    expect(outcome).toEqual({ status: 'ok', raw: '{"a":2}', value: { a: 2 } });
    expect(readFile).toHaveBeenCalledTimes(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  test('reports content that never parses', async () => {
    const readFile = vi.fn(async () => '{broken');
    const outcome = await readJsonWithRetry('state.json', { ...FAST, readFile });
    expect(outcome.status).toBe('unparsable');
    if (outcome.status === 'unparsable') {
      expect(outcome.raw).toBe('{broken');
    }
    expect(readFile).toHaveBeenCalledTimes(3);
  });

  test('gives up on persistent I/O errors', async () => {
    const readFile = vi.fn(async (): Promise<string> => {
      throw errno('EBUSY');
    });
    const outcome = await readJsonWithRetry('state.json', { ...FAST, readFile });
    expect(outcome.status).toBe('unavailable');
    expect(readFile).toHaveBeenCalledTimes(3);
  });

  test('treats an empty file as unavailable after retries', async () => {
    const outcome = await readJsonWithRetry('state.json', { ...FAST, readFile: async () => '  \n' });
    expect(outcome.status).toBe('unavailable');
  });
});
