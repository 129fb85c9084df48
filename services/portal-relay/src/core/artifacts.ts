import { randomUUID } from 'crypto';
import { copyFile, mkdir, readdir, rename, rm, stat, unlink } from 'fs/promises';
import { extname, join } from 'path';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function timestampSlug(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Store name for a produced file. The original filename is never reused;
 * only its extension survives, and only when it is a plain one.
 */
export function collisionFreeName(sourcePath: string, fallbackExt: string, date?: Date): string {
  const ext = extname(sourcePath).slice(1).toLowerCase();
  const safeExt = /^[a-z0-9]{1,8}$/.test(ext) ? ext : fallbackExt;
  return `${timestampSlug(date)}_${randomUUID()}.${safeExt}`;
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

export async function moveIntoStore(sourcePath: string, directory: string, fileName: string): Promise<string> {
  await mkdir(directory, { recursive: true });
  const target = join(directory, fileName);

  try {
    await rename(sourcePath, target);
  } catch (error) {
    if (!hasErrorCode(error, 'EXDEV')) throw error;
    await copyFile(sourcePath, target);
    await unlink(sourcePath);
  }

  return target;
}

export async function fileExists(path: string): Promise<boolean> {
  try {
    const info = await stat(path);
    return info.isFile();
  } catch {
    return false;
  }
}

/** Deletes entries of `directory` last modified before `now - maxAgeMs`. */
export async function sweepDirectory(directory: string, maxAgeMs: number, now = Date.now()): Promise<number> {
  await mkdir(directory, { recursive: true });
  const entries = await readdir(directory);
  const cutoffMs = now - maxAgeMs;
  let deleted = 0;

  for (const entry of entries) {
    const fullPath = join(directory, entry);
    let mtimeMs: number;
    try {
      ({ mtimeMs } = await stat(fullPath));
    } catch (error) {
      // Removed by a concurrent sweep or request since the listing.
      if (hasErrorCode(error, 'ENOENT')) continue;
      throw error;
    }
    if (mtimeMs <= cutoffMs) {
      await rm(fullPath, { recursive: true, force: true });
      deleted += 1;
    }
  }

  return deleted;
}
