import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

export class StoreError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'StoreError';
  }
}

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

/**
 * Reads and parses a JSON file. A missing file yields `undefined`; anything
 * unreadable or unparseable is a StoreError.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (e) {
    if (isMissingFile(e)) return undefined;
    throw new StoreError(`Cannot read ${filePath}: ${e instanceof Error ? e.message : String(e)}`, filePath, {
      cause: e,
    });
  }

  try {
    return JSON.parse(raw) as unknown;
  } catch (e) {
    throw new StoreError(`${filePath} is not valid JSON`, filePath, { cause: e });
  }
}

/** Rewrites the whole file via a temporary sibling + rename. */
export async function writeJsonFile(filePath: string, value: unknown): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  const tmp = filePath + '.tmp';
  try {
    await writeFile(tmp, JSON.stringify(value, null, 2) + '\n', 'utf8');
    await rename(tmp, filePath);
  } catch (e) {
    await rm(tmp, { force: true });
    throw e;
  }
}
