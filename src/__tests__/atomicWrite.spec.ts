import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import os from 'os';
import path from 'path';
import { mkdtemp, readFile, readdir, rm } from 'fs/promises';
import { z } from 'zod';
import { writeFileAtomic, writeJsonAtomic } from '../state/atomicWrite.js';

const DOCUMENT = z.object({ n: z.number(), filler: z.string() });

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), 'atomic-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('writeJsonAtomic', () => {
  test('creates missing directories and writes pretty JSON', async () => {
    const target = path.join(dir, 'nested', 'state.json');
    await writeJsonAtomic(target, { a: 1 });
    expect(await readFile(target, 'utf8')).toBe('{\n  "a": 1\n}\n');
  });

  test('leaves no temp files behind', async () => {
    const target = path.join(dir, 'state.json');
    await writeJsonAtomic(target, { a: 1 });
    await writeJsonAtomic(target, { a: 2 });
    expect(await readdir(dir)).toEqual(['state.json']);
  });

  test('concurrent readers only ever see complete documents', async () => {
    const target = path.join(dir, 'state.json');
    const payload = (n: number) => ({ n, filler: 'x'.repeat(50_000 + n) });
    await writeJsonAtomic(target, payload(0));

    let writing = true;
    const seen: number[] = [];
    const reader = (async () => {
      while (writing) {
        const raw = await readFile(target, 'utf8');
        const parsed = DOCUMENT.parse(JSON.parse(raw));
        expect(parsed.filler.length).toBe(50_000 + parsed.n);
        seen.push(parsed.n);
      }
    })();

    for (let n = 1; n <= 40; n += 1) {
      await writeJsonAtomic(target, payload(n));
    }
    writing = false;
    await reader;

    expect(seen.length).toBeGreaterThan(0);
    const final = DOCUMENT.parse(JSON.parse(await readFile(target, 'utf8')));
    expect(final.n).toBe(40);
  });
});

describe('writeFileAtomic', () => {
  test('replaces existing content in one step', async () => {
    const target = path.join(dir, 'plain.txt');
    await writeFileAtomic(target, 'first');
    await writeFileAtomic(target, 'second');
    expect(await readFile(target, 'utf8')).toBe('second');
  });

  test('rejects and cleans up when the target is a directory', async () => {
    const target = path.join(dir, 'occupied');
    await writeFileAtomic(path.join(target, 'inner.txt'), 'x');
    await expect(writeFileAtomic(target, 'y')).rejects.toThrow();
    expect(await readdir(dir)).toEqual(['occupied']);
  });
});
