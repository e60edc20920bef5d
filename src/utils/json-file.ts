import fs from 'fs/promises';
import path from 'path';
import { PersistenceCorruptError, getErrorMessage } from './errors';

/**
 * Read and parse a JSON file. Returns null when the file does not exist or is
 * blank; throws PersistenceCorruptError when it cannot be parsed.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    if (isMissingFile(error)) return null;
    throw new PersistenceCorruptError(filePath, getErrorMessage(error));
  }

  if (raw.trim() === '') return null;

  try {
    return JSON.parse(raw);
  } catch (error: unknown) {
    throw new PersistenceCorruptError(filePath, getErrorMessage(error));
  }
}

/**
 * Write pretty-printed JSON through a temp file and rename, so readers never
 * see a half-written file.
 */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tmp, JSON.stringify(data, null, 2) + '\n', 'utf-8');
  await fs.rename(tmp, filePath);
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

function isMissingFile(error: unknown): boolean {
  return hasErrorCode(error, 'ENOENT');
}
