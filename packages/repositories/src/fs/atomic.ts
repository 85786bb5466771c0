// Atomic file replacement for the registry snapshot and log.
// A reader sees either the old file or the new one, never a partial write.

import { randomUUID } from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/**
 * Suffix shared by every temp file written here, so leftovers from a
 * crash can be found and removed.
 */
export const TEMP_FILE_SUFFIX = '.tmp';

/**
 * Write content to a sibling temp file, flush it, then rename it over
 * the target.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });

  const tempPath = `${filePath}.${randomUUID()}${TEMP_FILE_SUFFIX}`;
  const handle = await fs.open(tempPath, 'w');
  try {
    await handle.writeFile(content, 'utf-8');
    await handle.sync();
  } finally {
    await handle.close();
  }

  try {
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Append content and flush it to disk.
 */
export async function appendFileDurable(filePath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });

  const handle = await fs.open(filePath, 'a');
  try {
    await handle.appendFile(content, 'utf-8');
    await handle.sync();
  } finally {
    await handle.close();
  }
}

/**
 * Read a file, returning null if it does not exist.
 */
export async function readFileIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFoundError(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * Remove temp files left behind by interrupted atomic writes of `filePath`.
 *
 * @returns The number of files removed
 */
export async function removeStaleTempFiles(filePath: string): Promise<number> {
  const dir = path.dirname(filePath);
  const prefix = `${path.basename(filePath)}.`;

  let names: string[];
  try {
    names = await fs.readdir(dir);
  } catch (error) {
    if (isNotFoundError(error)) {
      return 0;
    }
    throw error;
  }

  const stale = names.filter((name) => name.startsWith(prefix) && name.endsWith(TEMP_FILE_SUFFIX));
  await Promise.all(stale.map((name) => fs.rm(path.join(dir, name), { force: true })));
  return stale.length;
}

function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
