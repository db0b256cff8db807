import { createHash, randomUUID } from 'node:crypto';
import { rename, rm } from 'node:fs/promises';
import { homedir } from 'node:os';
import { basename, dirname, join } from 'node:path';
import { CACHE_DIR, envVar } from '../config/branding.js';
import { silentLogger, type Logger } from '../ui/output.js';
import { copyPreserving, ensureDir, fileExists } from '../utils/fs.js';
import { downloadFile, type Downloader } from './download.js';
import { CacheError, errorMessage } from './errors.js';

const FALLBACK_NAME = 'artifact';

export function getCacheRoot(): string {
  return process.env[envVar('CACHE_DIR')] ?? join(homedir(), CACHE_DIR);
}

/** The slice of the cache that commands and installers depend on. */
export interface ArtifactCache {
  get(url: string, recache?: boolean): Promise<string>;
  report(url: string): string;
  save(url: string, destination: string): Promise<string>;
}

export interface CacheOptions {
  download?: Downloader;
  logger?: Logger;
  /** Receives `report` output; stdout by default. */
  print?: (line: string) => void;
}

/**
 * URL-keyed artifact store: `<root>/<md5(url)>/<file name>`.
 *
 * Within one process a URL is downloaded at most once, or once more when
 * recache is requested. Downloads land in a temp file that is renamed into
 * place, so other processes sharing the directory never read a partial file.
 */
export class Cache implements ArtifactCache {
  private readonly inFlight = new Map<string, Promise<string>>();
  private readonly refreshed = new Set<string>();
  private readonly download: Downloader;
  private readonly logger: Logger;
  private readonly print: (line: string) => void;

  constructor(readonly root: string, options: CacheOptions = {}) {
    this.download = options.download ?? downloadFile;
    this.logger = options.logger ?? silentLogger;
    this.print = options.print ?? ((line) => console.log(line));
  }

  pathFor(url: string): string {
    const key = createHash('md5').update(url).digest('hex');
    return join(this.root, key, artifactName(url));
  }

  async get(url: string, recache = false): Promise<string> {
    const pending = this.inFlight.get(url);
    if (pending) return pending;

    const target = this.pathFor(url);
    const force = recache && !this.refreshed.has(url);
    if (!force && fileExists(target)) {
      this.logger.debug(`Cache hit for ${url}: ${target}`);
      return target;
    }

    if (recache) this.refreshed.add(url);
    const fetching = this.fetch(url, target).finally(() => this.inFlight.delete(url));
    this.inFlight.set(url, fetching);
    return fetching;
  }

  report(url: string): string {
    const path = this.requireCached(url);
    this.print(path);
    return path;
  }

  async save(url: string, destination: string): Promise<string> {
    const path = this.requireCached(url);
    this.logger.debug(`Copying ${path} to ${destination}`);
    try {
      return await copyPreserving(path, destination);
    } catch (err) {
      throw new CacheError(url, `Cannot save ${url} to ${destination}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  private requireCached(url: string): string {
    const path = this.pathFor(url);
    if (!fileExists(path)) {
      throw new CacheError(url, `${url} is not in the cache (${this.root})`);
    }
    return path;
  }

  private async fetch(url: string, target: string): Promise<string> {
    const dir = dirname(target);
    const temp = join(dir, `.tmp-${randomUUID()}`);
    this.logger.debug(`Downloading ${url} to ${target}`);

    try {
      ensureDir(dir);
      await this.download(url, temp);
      await rename(temp, target);
    } catch (err) {
      await rm(temp, { force: true });
      throw new CacheError(url, `Failed to download ${url}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    return target;
  }
}

export function artifactName(url: string): string {
  let name: string;
  try {
    name = basename(decodeURIComponent(new URL(url).pathname));
  } catch {
    name = basename(url);
  }
  return name === '' || name === '.' || name === '..' ? FALLBACK_NAME : name;
}
