import { execFileSync } from 'node:child_process';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { Downloader } from '../../src/core/download.js';
import type { PlatformResolver } from '../../src/core/platform.js';
import type { Logger } from '../../src/ui/output.js';

export function makeTempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `cbdep-${prefix}-`));
}

export function writeCatalog(dir: string, content: string): string {
  const path = join(dir, 'cbdep.config');
  writeFileSync(path, content);
  return path;
}

/**
 * In-process stand-in for the network: serves `files[url]`, records each
 * request, and answers 404 for anything else. Mutate `files` to change upstream.
 */
export function fakeUpstream(files: Record<string, string | Uint8Array>) {
  const calls: string[] = [];
  const download: Downloader = async (url, destination) => {
    calls.push(url);
    const body = files[url];
    if (body === undefined) throw new Error('HTTP 404 Not Found');
    await writeFile(destination, body);
  };
  return { download, calls, files };
}

export function fixedPlatform(id: string, arch = 'x86_64'): PlatformResolver & { detections: number } {
  const resolver: PlatformResolver & { detections: number } = {
    detections: 0,
    detect: () => {
      resolver.detections += 1;
      return id;
    },
    arch: () => arch,
  };
  return resolver;
}

export function recordingLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger: Logger = {
    debug: (msg) => lines.push(`debug: ${msg}`),
    info: (msg) => lines.push(`info: ${msg}`),
    ok: (msg) => lines.push(`ok: ${msg}`),
    warn: (msg) => lines.push(`warn: ${msg}`),
    error: (msg) => lines.push(`error: ${msg}`),
  };
  return { logger, lines };
}

const CRC_TABLE = Array.from({ length: 256 }, (_, n) => {
  let c = n;
  for (let k = 0; k < 8; k++) c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
  return c >>> 0;
});

function crc32(data: Buffer): number {
  let crc = 0xffffffff;
  for (const byte of data) crc = (CRC_TABLE[(crc ^ byte) & 0xff] ?? 0) ^ (crc >>> 8);
  return (crc ^ 0xffffffff) >>> 0;
}

/**
 * Writes an uncompressed zip holding `entries`. Names ending in `/` are
 * directories; all other entries are regular 0644 files.
 */
export function writeZip(path: string, entries: Record<string, string>): void {
  const locals: Buffer[] = [];
  const centrals: Buffer[] = [];
  let offset = 0;

  for (const [name, content] of Object.entries(entries)) {
    const isDir = name.endsWith('/');
    const nameBytes = Buffer.from(name, 'utf-8');
    const data = Buffer.from(isDir ? '' : content, 'utf-8');
    const crc = crc32(data);

    const local = Buffer.alloc(30);
    local.writeUInt32LE(0x04034b50, 0);
    local.writeUInt16LE(20, 4);
    local.writeUInt16LE(0, 6);
    local.writeUInt16LE(0, 8);
    local.writeUInt16LE(0, 10);
    local.writeUInt16LE(0x21, 12);
    local.writeUInt32LE(crc, 14);
    local.writeUInt32LE(data.length, 18);
    local.writeUInt32LE(data.length, 22);
    local.writeUInt16LE(nameBytes.length, 26);
    local.writeUInt16LE(0, 28);

    const mode = isDir ? 0o40755 : 0o100644;
    const central = Buffer.alloc(46);
    central.writeUInt32LE(0x02014b50, 0);
    central.writeUInt16LE((3 << 8) | 20, 4);
    central.writeUInt16LE(20, 6);
    central.writeUInt16LE(0, 8);
    central.writeUInt16LE(0, 10);
    central.writeUInt16LE(0, 12);
    central.writeUInt16LE(0x21, 14);
    central.writeUInt32LE(crc, 16);
    central.writeUInt32LE(data.length, 20);
    central.writeUInt32LE(data.length, 24);
    central.writeUInt16LE(nameBytes.length, 28);
    central.writeUInt16LE(0, 30);
    central.writeUInt16LE(0, 32);
    central.writeUInt16LE(0, 34);
    central.writeUInt16LE(0, 36);
    central.writeUInt32LE(((mode << 16) | (isDir ? 0x10 : 0)) >>> 0, 38);
    central.writeUInt32LE(offset, 42);

    locals.push(local, nameBytes, data);
    centrals.push(central, nameBytes);
    offset += local.length + nameBytes.length + data.length;
  }

  const directory = Buffer.concat(centrals);
  const count = Object.keys(entries).length;
  const end = Buffer.alloc(22);
  end.writeUInt32LE(0x06054b50, 0);
  end.writeUInt16LE(0, 4);
  end.writeUInt16LE(0, 6);
  end.writeUInt16LE(count, 8);
  end.writeUInt16LE(count, 10);
  end.writeUInt32LE(directory.length, 12);
  end.writeUInt32LE(offset, 16);
  end.writeUInt16LE(0, 20);

  writeFileSync(path, Buffer.concat([...locals, directory, end]));
}

/** Whether the system `unzip` that zip extraction shells out to is on PATH. */
export function hasUnzip(): boolean {
  try {
    execFileSync('unzip', ['-v'], { stdio: 'ignore' });
    return true;
  } catch {
    return false;
  }
}
