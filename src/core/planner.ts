import type { Catalog } from '../types/catalog.js';
import type { InstallRequest } from '../types/request.js';
import type { Logger } from '../ui/output.js';
import type { ArtifactCache } from './cache.js';
import { loadCatalog, lookupEntry } from './catalog.js';
import { UnknownPackageError } from './errors.js';
import { Installer } from './installer.js';
import type { PlatformResolver } from './platform.js';

export type PlanRequest = Pick<InstallRequest, 'package' | 'cacheOnly' | 'recache'>;

/** Binds catalog entries to the shared cache and the effective platform. */
export class InstallPlanner {
  constructor(
    readonly catalog: Catalog,
    private readonly cache: ArtifactCache,
    readonly platform: string,
    private readonly platforms: PlatformResolver,
    private readonly logger: Logger,
  ) {}

  static fromConfig(
    path: string,
    cache: ArtifactCache,
    platform: string,
    platforms: PlatformResolver,
    logger: Logger,
  ): InstallPlanner {
    logger.debug(`Loading catalog ${path}`);
    return new InstallPlanner(loadCatalog(path), cache, platform, platforms, logger);
  }

  plan(request: PlanRequest): Installer {
    const entry = lookupEntry(this.catalog, request.package);
    if (!entry) {
      throw new UnknownPackageError(
        request.package,
        `Package "${request.package}" not found in ${this.catalog.path}`,
      );
    }
    if (entry.kind === 'legacy') {
      throw new UnknownPackageError(
        request.package,
        `Package "${request.package}" is a classic cbdeps package with no descriptor in ${this.catalog.path}`,
      );
    }

    const installer = new Installer(entry, this.cache, this.platform, this.platforms, this.logger);
    installer.setCacheOnly(request.cacheOnly);
    installer.setRecache(request.recache);
    return installer;
  }
}
