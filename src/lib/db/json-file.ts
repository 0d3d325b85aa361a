import { mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { PersistenceError } from '@/lib/errors';

export type JsonReadResult =
  | { readonly status: 'missing' }
  | { readonly status: 'ok'; readonly data: unknown }
  | { readonly status: 'invalid'; readonly error: unknown };

const isErrnoCode = (error: unknown, code: string): boolean =>
  error instanceof Error && 'code' in error && error.code === code;

/** Reads and parses a JSON file without throwing. */
export async function readJsonFile(filePath: string): Promise<JsonReadResult> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoCode(error, 'ENOENT')) {
      return { status: 'missing' };
    }
    return { status: 'invalid', error };
  }

  try {
    return { status: 'ok', data: JSON.parse(raw) };
  } catch (error) {
    return { status: 'invalid', error };
  }
}

let tempCounter = 0;

/**
 * Writes `data` as JSON next to `filePath` and renames it into place, so the
 * previous content stays intact until the new file is complete.
 */
export async function writeJsonFileAtomic(filePath: string, data: unknown): Promise<void> {
  const dir = path.dirname(filePath);
  tempCounter += 1;
  const tempPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${tempCounter}.tmp`);

  try {
    await mkdir(dir, { recursive: true });
    await writeFile(tempPath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch(() => undefined);
    throw new PersistenceError(`Unable to write ${filePath}`, filePath, { cause: error });
  }
}

export async function removeFile(filePath: string): Promise<void> {
  try {
    await unlink(filePath);
  } catch (error) {
    if (!isErrnoCode(error, 'ENOENT')) {
      throw new PersistenceError(`Unable to remove ${filePath}`, filePath, { cause: error });
    }
  }
}
