import { mkdirSync, statSync } from 'node:fs';
import { chmod, copyFile, stat, utimes } from 'node:fs/promises';
import { basename, join } from 'node:path';

export function ensureDir(path: string, mode?: number): void {
  mkdirSync(path, { recursive: true, mode });
}

export function dirExists(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

export function fileExists(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/**
 * Copies `src` to `dest` keeping permission bits and access/modification times.
 * An existing directory as `dest` receives the file under its own name.
 * Returns the path written.
 */
export async function copyPreserving(src: string, dest: string): Promise<string> {
  const target = dirExists(dest) ? join(dest, basename(src)) : dest;
  const info = await stat(src);

  await copyFile(src, target);
  await chmod(target, info.mode & 0o7777);
  await utimes(target, info.atime, info.mtime);
  return target;
}
