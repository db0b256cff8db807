import { resolve } from 'node:path';
import type {
  CacheRequest,
  InstallRequest,
  InvocationRequest,
  ListRequest,
} from '../types/request.js';
import type { Logger } from '../ui/output.js';
import { copyPreserving } from '../utils/fs.js';
import type { ArtifactCache } from './cache.js';
import { formatPackageList, loadCatalog } from './catalog.js';
import { InstallError } from './errors.js';
import type { Installer } from './installer.js';
import type { ConfigLocator } from './locator.js';
import { InstallPlanner } from './planner.js';
import type { PlatformResolver } from './platform.js';

const DEFAULT_INSTALL_DIR = 'install';

export interface OrchestratorDeps {
  cache: ArtifactCache;
  logger: Logger;
  platforms: PlatformResolver;
  locator: ConfigLocator;
  /** Command output (list, platform); stdout by default. */
  print?: (line: string) => void;
}

export interface InstallOutcome {
  installDir: string;
  platform: string;
  /** Cache path of the last artifact the installer fetched. */
  artifact: string | undefined;
  /** Where the artifact was copied with --output. */
  output: string | undefined;
}

/**
 * Runs exactly one command per invocation. Each command is a single pass:
 * nothing is retried here, and the first failure ends the command.
 */
export class Orchestrator {
  private readonly print: (line: string) => void;

  constructor(private readonly deps: OrchestratorDeps) {
    this.print = deps.print ?? ((line) => console.log(line));
  }

  async run(request: InvocationRequest): Promise<void> {
    switch (request.kind) {
      case 'cache':
        await this.cache(request);
        return;
      case 'install':
        await this.install(request);
        return;
      case 'platform':
        this.platform();
        return;
      case 'list':
        this.list(request);
        return;
    }
  }

  async cache(request: CacheRequest): Promise<string> {
    const { cache } = this.deps;
    const path = await cache.get(request.url, request.recache);

    if (request.report) {
      cache.report(request.url);
    }
    if (request.output !== undefined) {
      await cache.save(request.url, request.output);
    }
    return path;
  }

  async install(request: InstallRequest): Promise<InstallOutcome> {
    const { cache, logger, platforms, locator } = this.deps;
    const installDir = resolve(request.installDir ?? DEFAULT_INSTALL_DIR);
    const platform = this.effectivePlatform(request.platform);
    logger.debug(`Platform: ${platform}; install directory: ${installDir}`);

    const planner = InstallPlanner.fromConfig(
      locator.resolve(request.configFile),
      cache,
      platform,
      platforms,
      logger,
    );
    const installer = planner.plan(request);

    await installer.install({
      version: request.version,
      x32: request.x32,
      baseUrl: request.baseUrl,
      installDir,
    });

    let output: string | undefined;
    if (request.report) {
      cache.report(this.requireFetched(installer, request, platform).url);
    }
    if (request.output !== undefined) {
      const { path } = this.requireFetched(installer, request, platform);
      logger.debug(`Copying downloaded file to ${request.output}`);
      output = await copyPreserving(path, request.output);
    }

    return { installDir, platform, artifact: installer.lastFetchedPath(), output };
  }

  platform(): string {
    this.deps.logger.debug('Determining platform...');
    const platform = this.deps.platforms.detect();
    this.print(platform);
    return platform;
  }

  list(request: ListRequest): string[] {
    const lines = formatPackageList(loadCatalog(this.deps.locator.resolve(request.configFile)));
    for (const line of lines) {
      this.print(line);
    }
    return lines;
  }

  /** An override wins unconditionally; detection only runs without one. */
  effectivePlatform(override: string | undefined): string {
    return override ?? this.deps.platforms.detect();
  }

  private requireFetched(
    installer: Installer,
    request: InstallRequest,
    platform: string,
  ): { url: string; path: string } {
    const url = installer.lastFetchedUrl();
    const path = installer.lastFetchedPath();
    if (url === undefined || path === undefined) {
      throw new InstallError(request.package, request.version, platform, 'nothing was downloaded');
    }
    return { url, path };
  }
}
