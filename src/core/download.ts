import { createWriteStream } from 'node:fs';
import { copyFile, mkdir, unlink } from 'node:fs/promises';
import { dirname } from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { fileURLToPath } from 'node:url';
import { APP_NAME, currentVersion } from '../config/branding.js';

/** Writes the resource at `url` to `destination`, rejecting on any failure. */
export type Downloader = (url: string, destination: string) => Promise<void>;

export const downloadFile: Downloader = async (url, destination) => {
  await mkdir(dirname(destination), { recursive: true });

  // Local mirrors: fetch() has no file: support
  if (url.startsWith('file:')) {
    await copyFile(fileURLToPath(url), destination);
    return;
  }

  const response = await fetch(url, {
    headers: {
      'User-Agent': `${APP_NAME}/${currentVersion()}`,
    },
  });

  if (!response.ok) {
    throw new Error(`HTTP ${response.status} ${response.statusText}`);
  }

  if (!response.body) {
    throw new Error('No response body received');
  }

  try {
    await pipeline(Readable.fromWeb(response.body), createWriteStream(destination));
  } catch (error) {
    await unlink(destination).catch(() => undefined);
    throw error;
  }
};
