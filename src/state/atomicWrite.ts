import fs from 'fs/promises';
import path from 'path';
import { TEMP_SUFFIX } from './paths.js';

let tempCounter = 0;

function tempPathFor(targetPath: string): string {
  tempCounter = (tempCounter + 1) % Number.MAX_SAFE_INTEGER;
  const base = path.basename(targetPath);
  return path.join(path.dirname(targetPath), `.${base}.${process.pid}.${tempCounter}${TEMP_SUFFIX}`);
}

/**
 * Writes `contents` next to `targetPath` and renames it into place, so a concurrent
 * reader sees either the previous document or the new one in full.
 */
export async function writeFileAtomic(targetPath: string, contents: string): Promise<void> {
  await fs.mkdir(path.dirname(targetPath), { recursive: true });
  const tempPath = tempPathFor(targetPath);
  try {
    await fs.writeFile(tempPath, contents, 'utf8');
    await fs.rename(tempPath, targetPath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

export async function writeJsonAtomic(targetPath: string, value: unknown): Promise<void> {
  await writeFileAtomic(targetPath, `${JSON.stringify(value, null, 2)}\n`);
}
