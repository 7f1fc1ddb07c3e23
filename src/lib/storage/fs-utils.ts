import { randomBytes } from 'crypto';
import { chmod, readFile, rename, rm, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';

/**
 * Write a file by writing a temporary sibling and renaming it over the
 * target, so readers only ever observe the old or the new content.
 */
export async function writeFileAtomic(path: string, data: string, mode: number): Promise<void> {
  const tmp = join(dirname(path), `.${basename(path)}.${randomBytes(6).toString('hex')}.tmp`);
  try {
    await writeFile(tmp, data, { mode });
    // mode passed to writeFile is masked by umask
    await chmod(tmp, mode);
    await rename(tmp, path);
  } catch (e) {
    await rm(tmp, { force: true });
    throw e;
  }
}

export function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/** Read a UTF-8 file, returning undefined when it does not exist. */
export async function readOptionalFile(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, 'utf-8');
  } catch (e) {
    if (isNotFound(e)) return undefined;
    throw e;
  }
}
