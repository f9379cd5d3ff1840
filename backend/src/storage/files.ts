import { randomBytes } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Read a UTF-8 file, or return null when it does not exist yet.
 * Any other failure (permissions, directory in place of file) is rethrown.
 */
export async function readTextIfExists(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf8');
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw err;
  }
}

/** Temp path next to the target, so the final rename stays on one filesystem */
export function tempPathFor(path: string): string {
  return join(dirname(path), `.${basename(path)}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`);
}

/**
 * Publish a file atomically: the content is produced into a temp file in the
 * target's directory, then renamed over the target. Readers see either the old
 * file or the complete new one.
 */
export async function publishAtomically(path: string, produce: (tempPath: string) => Promise<void>): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tempPath = tempPathFor(path);
  try {
    await produce(tempPath);
    await rename(tempPath, path);
  } catch (err) {
    await rm(tempPath, { force: true });
    throw err;
  }
}

export interface PendingFile {
  path: string;
  produce: (tempPath: string) => Promise<void>;
}

/**
 * Publish several files as a set: every temp file is produced before any is
 * renamed, so a failed write leaves all targets as they were.
 */
export async function publishAllAtomically(files: readonly PendingFile[]): Promise<void> {
  const staged: Array<{ path: string; tempPath: string }> = [];
  try {
    for (const file of files) {
      await mkdir(dirname(file.path), { recursive: true });
      const tempPath = tempPathFor(file.path);
      staged.push({ path: file.path, tempPath });
      await file.produce(tempPath);
    }
    for (const { path, tempPath } of staged) {
      await rename(tempPath, path);
    }
  } catch (err) {
    await Promise.all(staged.map(({ tempPath }) => rm(tempPath, { force: true })));
    throw err;
  }
}

export async function writeFileAtomic(path: string, content: string): Promise<void> {
  await publishAtomically(path, (tempPath) => writeFile(tempPath, content, 'utf8'));
}
