import { lstat, mkdir, mkdtemp, readdir, rename, rm, rmdir, stat } from 'node:fs/promises';
import { execFileSync } from 'node:child_process';
import { basename, dirname, join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { extract as tarExtract } from 'tar';

export type ArchiveType = 'tar' | 'zip' | 'unknown';

export type ExtractOptions = {
  archivePath: string;
  destination: string;
  stripComponents?: number;
};

export function getArchiveType(filename: string): ArchiveType {
  const lower = filename.toLowerCase();
  if (
    lower.endsWith('.tar.gz') ||
    lower.endsWith('.tgz') ||
    lower.endsWith('.tar')
  ) {
    return 'tar';
  }
  if (lower.endsWith('.zip')) return 'zip';
  return 'unknown';
}

export async function extractTar(options: ExtractOptions): Promise<void> {
  const { archivePath, destination, stripComponents = 0 } = options;

  await mkdir(destination, { recursive: true });
  await tarExtract({
    file: archivePath,
    cwd: destination,
    strip: stripComponents,
  });
}

export async function extractZip(options: ExtractOptions): Promise<void> {
  const { archivePath, destination, stripComponents = 0 } = options;

  await mkdir(destination, { recursive: true });

  // Unpack beside the destination so stripping sees only this archive's entries
  const staging = await mkdtemp(join(dirname(destination), `.${basename(destination)}-unzip-`));
  try {
    // System unzip keeps file permissions, which JS implementations drop
    if (process.platform === 'win32') {
      execFileSync('powershell', [
        '-NoProfile',
        '-Command',
        `Expand-Archive -LiteralPath ${psQuote(archivePath)} -DestinationPath ${psQuote(staging)} -Force`,
      ]);
    } else {
      execFileSync('unzip', ['-o', '-q', archivePath, '-d', staging]);
    }

    for (let level = 0; level < stripComponents; level++) {
      await hoistSingleDirectory(staging);
    }
    await mergeInto(staging, destination);
  } finally {
    await rm(staging, { recursive: true, force: true });
  }
}

function psQuote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/** Moves the contents of a lone top-level directory up into `dir`. */
async function hoistSingleDirectory(dir: string): Promise<void> {
  const entries = await readdir(dir);
  if (entries.length !== 1) return;

  const single = join(dir, entries[0] ?? '');
  if (!(await stat(single)).isDirectory()) return;

  // Park it under a unique name first: it may contain an entry named like itself
  const holder = join(dir, `.strip-${randomUUID()}`);
  await rename(single, holder);
  for (const item of await readdir(holder)) {
    await rename(join(holder, item), join(dir, item));
  }
  await rmdir(holder);
}

/** Moves every entry of `from` into `to`, merging directories and replacing files. */
async function mergeInto(from: string, to: string): Promise<void> {
  for (const item of await readdir(from)) {
    const source = join(from, item);
    const target = join(to, item);
    const existing = await lstat(target).catch(() => undefined);

    if (existing?.isDirectory() && (await lstat(source)).isDirectory()) {
      await mergeInto(source, target);
      continue;
    }
    if (existing) await rm(target, { recursive: true, force: true });
    await rename(source, target);
  }
}

export async function extractArchive(options: ExtractOptions): Promise<void> {
  switch (getArchiveType(options.archivePath)) {
    case 'tar':
      return extractTar(options);
    case 'zip':
      return extractZip(options);
    default:
      throw new Error(
        `Unknown archive type for ${options.archivePath}. ` +
          'Supported formats: .tar.gz, .tgz, .tar, .zip',
      );
  }
}
