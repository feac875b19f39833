import fs from 'fs/promises';
import { z } from 'zod';
import { DatasetLoadError, describeError, errnoCode } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import type { Difficulty, DifficultyTag } from '../types.js';

export interface DifficultyLookup {
  difficultyOf(questionId: string): DifficultyTag;
}

export interface DatasetIndexOptions {
  readonly logger?: Logger;
  readonly readFile?: (filePath: string) => Promise<string>;
}

interface ParsedDataset {
  readonly difficulties: Map<string, Difficulty>;
  readonly skipped: number;
  readonly records: number;
}

const DATASET_LINE_SCHEMA = z
  .object({
    question_id: z.string().min(1).optional(),
    questionId: z.string().min(1).optional(),
    difficulty: z.unknown()
  })
  .passthrough();

export function normalizeDifficulty(value: unknown): Difficulty | undefined {
  if (typeof value !== 'string') return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'easy' || normalized === 'medium' || normalized === 'hard') {
    return normalized;
  }
  return undefined;
}

function parseDataset(contents: string): ParsedDataset {
  const difficulties = new Map<string, Difficulty>();
  let skipped = 0;
  let records = 0;
  for (const rawLine of contents.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      skipped += 1;
      continue;
    }
    const result = DATASET_LINE_SCHEMA.safeParse(parsed);
    const record = result.success ? result.data : undefined;
    const questionId = record?.question_id ?? record?.questionId;
    if (!record || questionId === undefined) {
      skipped += 1;
      continue;
    }
    records += 1;
    // Records with an unrecognized tag still count as parsed; lookups fall back to 'unknown'.
    const difficulty = normalizeDifficulty(record.difficulty);
    if (difficulty) {
      difficulties.set(questionId, difficulty);
    }
  }
  return { difficulties, skipped, records };
}

/**
 * Question → difficulty lookup backed by a JSON-lines dataset file.
 *
 * The file is read at most once per instance: the first `load()` starts the read and every
 * other caller, concurrent or later, awaits the same promise. Share one instance between
 * the statistics code and the state manager instead of constructing several.
 */
export class DatasetIndex implements DifficultyLookup {
  private difficulties = new Map<string, Difficulty>();
  private loading?: Promise<void>;
  private loaded = false;
  private readonly logger: Logger;
  private readonly readFile: (filePath: string) => Promise<string>;

  constructor(
    readonly datasetPath: string,
    options: DatasetIndexOptions = {}
  ) {
    this.logger = options.logger ?? createLogger('dataset');
    this.readFile = options.readFile ?? ((filePath) => fs.readFile(filePath, 'utf8'));
  }

  load(): Promise<void> {
    if (!this.loading) {
      this.loading = this.readOnce();
    }
    return this.loading;
  }

  get isLoaded(): boolean {
    return this.loaded;
  }

  get size(): number {
    return this.difficulties.size;
  }

  difficultyOf(questionId: string): DifficultyTag {
    return this.difficulties.get(questionId) ?? 'unknown';
  }

  private async readOnce(): Promise<void> {
    let contents: string;
    try {
      contents = await this.readFile(this.datasetPath);
    } catch (error) {
      const reason = errnoCode(error) === 'ENOENT' ? 'file not found' : describeError(error);
      throw new DatasetLoadError(this.datasetPath, `dataset index unavailable: ${reason}`, {
        cause: error
      });
    }

    const parsed = parseDataset(contents);
    if (parsed.records === 0 && parsed.skipped > 0) {
      throw new DatasetLoadError(
        this.datasetPath,
        `dataset index unparsable: none of ${parsed.skipped} lines is a question record`
      );
    }
    if (parsed.skipped > 0) {
      this.logger.warn({ path: this.datasetPath, skipped: parsed.skipped }, 'dataset.lines.skipped');
    }

    this.difficulties = parsed.difficulties;
    this.loaded = true;
    this.logger.debug({ path: this.datasetPath, questions: parsed.difficulties.size }, 'dataset.loaded');
  }
}
