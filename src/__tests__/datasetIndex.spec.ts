import { describe, expect, test, vi } from 'vitest';
import os from 'os';
import path from 'path';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { DatasetIndex, normalizeDifficulty } from '../dataset/datasetIndex.js';
import { DatasetLoadError } from '../errors.js';
import { silentLogger } from '../logger.js';

const DATASET = [
  JSON.stringify({ question_id: 'q-easy', difficulty: 'easy' }),
  JSON.stringify({ question_id: 'q-medium', difficulty: 'Medium' }),
  JSON.stringify({ questionId: 'q-hard', difficulty: ' HARD ' }),
  ''
].join('\n');

describe('DatasetIndex', () => {
  test('maps question ids to normalized difficulties', async () => {
    const index = new DatasetIndex('dataset.jsonl', {
      logger: silentLogger(),
      readFile: async () => DATASET
    });
    await index.load();
    expect(index.isLoaded).toBe(true);
    expect(index.size).toBe(3);
    expect(index.difficultyOf('q-easy')).toBe('easy');
    expect(index.difficultyOf('q-medium')).toBe('medium');
    expect(index.difficultyOf('q-hard')).toBe('hard');
  });

  test('returns unknown for questions not in the dataset', async () => {
    const index = new DatasetIndex('dataset.jsonl', {
      logger: silentLogger(),
      readFile: async () => DATASET
    });
    await index.load();
    expect(index.difficultyOf('q-missing')).toBe('unknown');
  });

  test('reads the file once for concurrent and later callers', async () => {
    const readFile = vi.fn(async () => DATASET);
    const index = new DatasetIndex('dataset.jsonl', { logger: silentLogger(), readFile });
    await Promise.all([index.load(), index.load(), index.load()]);
    await index.load();
    expect(readFile).toHaveBeenCalledTimes(1);
  });

  test('skips malformed lines when at least one record parses', async () => {
    const index = new DatasetIndex('dataset.jsonl', {
      logger: silentLogger(),
      readFile: async () => `not json\n${JSON.stringify({ question_id: 'q1', difficulty: 'hard' })}\n[1]`
    });
    await index.load();
    expect(index.size).toBe(1);
    expect(index.difficultyOf('q1')).toBe('hard');
  });

  test('fails when no line is a question record', async () => {
    const index = new DatasetIndex('dataset.jsonl', {
      logger: silentLogger(),
      readFile: async () => 'garbage\n{"foo": 1}\n'
    });
    await expect(index.load()).rejects.toBeInstanceOf(DatasetLoadError);
    expect(index.isLoaded).toBe(false);
  });

  test('fails with a load error when the file is absent', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'dataset-'));
    try {
      const datasetPath = path.join(dir, 'missing.jsonl');
      const index = new DatasetIndex(datasetPath, { logger: silentLogger() });
      await expect(index.load()).rejects.toThrow('dataset index unavailable: file not found');
      await expect(index.load()).rejects.toMatchObject({ code: 'DATASET_LOAD', datasetPath });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  test('loads from disk', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'dataset-'));
    try {
      const datasetPath = path.join(dir, 'dataset.jsonl');
      await writeFile(datasetPath, DATASET, 'utf8');
      const index = new DatasetIndex(datasetPath, { logger: silentLogger() });
      await index.load();
      expect(index.difficultyOf('q-hard')).toBe('hard');
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe('normalizeDifficulty', () => {
  test('accepts the three tags in any case', () => {
    expect(normalizeDifficulty('EASY')).toBe('easy');
    expect(normalizeDifficulty('expert')).toBeUndefined();
    expect(normalizeDifficulty(3)).toBeUndefined();
  });
});
