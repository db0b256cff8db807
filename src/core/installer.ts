import { execFileSync } from 'node:child_process';
import { chmod, copyFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type {
  Action,
  CopyAction,
  DetailedEntry,
  ExpandAction,
  RunAction,
  Variant,
} from '../types/catalog.js';
import type { Logger } from '../ui/output.js';
import { ensureDir } from '../utils/fs.js';
import type { ArtifactCache } from './cache.js';
import { ConfigError, InstallError, UnsupportedPlatformError, errorMessage } from './errors.js';
import { extractArchive } from './extract.js';
import { osFamily, platformCandidates, type PlatformResolver } from './platform.js';
import { renderTemplate, usesVariable, type TemplateVars } from './template.js';

const DEFAULT_ACTIONS: Action[] = [{ action: 'expand' }];
const X32_ARCH = 'x86';

export interface InstallOptions {
  version: string;
  x32: boolean;
  baseUrl?: string;
  /** Absolute path. */
  installDir: string;
}

export interface SelectedVariant {
  variant: Variant;
  /** The platform id the variant matched on. */
  platform: string;
}

interface Fetched {
  url: string;
  path: string;
}

/**
 * Runs one descriptor's install steps for one platform. Every artifact goes
 * through the shared cache; in cache-only mode only the fetches happen.
 */
export class Installer {
  private cacheOnly = false;
  private recache = false;
  private lastFetched: Fetched | undefined;

  constructor(
    private readonly entry: DetailedEntry,
    private readonly cache: ArtifactCache,
    private readonly platform: string,
    private readonly platforms: PlatformResolver,
    private readonly logger: Logger,
  ) {}

  get cacheOnlyMode(): boolean {
    return this.cacheOnly;
  }

  get recacheMode(): boolean {
    return this.recache;
  }

  setCacheOnly(cacheOnly: boolean): void {
    this.cacheOnly = cacheOnly;
  }

  setRecache(recache: boolean): void {
    this.recache = recache;
  }

  lastFetchedPath(): string | undefined {
    return this.lastFetched?.path;
  }

  lastFetchedUrl(): string | undefined {
    return this.lastFetched?.url;
  }

  selectVariant(version: string, x32: boolean): SelectedVariant {
    const { variants } = this.entry.descriptor;

    for (const candidate of platformCandidates(this.platform)) {
      const variant = variants.find((v) => v.platforms.includes(candidate));
      if (!variant) continue;

      if (x32 && !variant.supports_x32) {
        throw new UnsupportedPlatformError(
          this.entry.name,
          version,
          this.platform,
          'no 32-bit build available',
        );
      }
      return { variant, platform: candidate };
    }

    throw new UnsupportedPlatformError(this.entry.name, version, this.platform);
  }

  async install(options: InstallOptions): Promise<void> {
    const { version, x32, baseUrl, installDir } = options;
    const { variant, platform } = this.selectVariant(version, x32);
    this.logger.debug(`Installing ${this.entry.name} ${version} using the "${platform}" variant`);

    if (baseUrl !== undefined && !usesVariable(variant.url, 'base_url')) {
      this.logger.warn(`${this.entry.name} does not use a base URL; ignoring ${baseUrl}`);
    }

    const vars: TemplateVars = {
      package: this.entry.name,
      version,
      platform,
      os: osFamily(platform),
      arch: this.archName(variant, x32),
      base_url: baseUrl ?? variant.base_url ?? '',
      install_dir: installDir,
    };

    try {
      let current = await this.fetch(renderTemplate(variant.url, vars));

      for (const action of variant.actions ?? DEFAULT_ACTIONS) {
        if (action.action === 'fetch') {
          current = await this.fetch(renderTemplate(action.url, vars));
          continue;
        }
        if (this.cacheOnly) {
          this.logger.debug(`Cache-only: skipping ${action.action} step`);
          continue;
        }
        await this.perform(action, { ...vars, artifact: current });
      }
    } catch (err) {
      if (err instanceof ConfigError) throw err;
      throw new InstallError(this.entry.name, version, this.platform, errorMessage(err), {
        cause: err,
      });
    }

    if (this.cacheOnly) {
      this.logger.info(`Downloaded ${this.entry.name} ${version}; install steps skipped`);
    } else {
      this.logger.ok(`Installed ${this.entry.name} ${version} into ${installDir}`);
    }
  }

  private archName(variant: Variant, x32: boolean): string {
    const canonical = x32 ? X32_ARCH : this.platforms.arch();
    return variant.arch_names?.[canonical] ?? canonical;
  }

  private async fetch(url: string): Promise<string> {
    const path = await this.cache.get(url, this.recache);
    this.lastFetched = { url, path };
    return path;
  }

  private async perform(
    action: ExpandAction | CopyAction | RunAction,
    vars: TemplateVars,
  ): Promise<void> {
    switch (action.action) {
      case 'expand':
        return this.expand(action, vars);
      case 'copy':
        return this.copy(action, vars);
      case 'run':
        return this.run(action, vars);
    }
  }

  private async expand(action: ExpandAction, vars: TemplateVars): Promise<void> {
    const destination = renderTemplate(action.dir ?? '${install_dir}', vars);
    this.logger.debug(`Expanding ${vars['artifact']} into ${destination}`);
    await extractArchive({
      archivePath: requireVar(vars, 'artifact'),
      destination,
      stripComponents: action.strip ?? 0,
    });
  }

  private async copy(action: CopyAction, vars: TemplateVars): Promise<void> {
    const artifact = requireVar(vars, 'artifact');
    const dir = renderTemplate(action.to ?? '${install_dir}', vars);
    const target = join(dir, action.name ? renderTemplate(action.name, vars) : basename(artifact));

    ensureDir(dir);
    this.logger.debug(`Copying ${artifact} to ${target}`);
    await copyFile(artifact, target);
    if (action.mode) {
      await chmod(target, parseInt(action.mode, 8));
    }
  }

  private async run(action: RunAction, vars: TemplateVars): Promise<void> {
    const [file, ...args] = action.command.map((part) => renderTemplate(part, vars));
    const cwd = renderTemplate(action.cwd ?? '${install_dir}', vars);
    const env: NodeJS.ProcessEnv = { ...process.env };
    for (const [key, value] of Object.entries(action.env ?? {})) {
      env[key] = renderTemplate(value, vars);
    }

    ensureDir(cwd);
    this.logger.debug(`Running ${[file, ...args].join(' ')} in ${cwd}`);
    execFileSync(file, args, { cwd, env, stdio: 'inherit' });
  }
}

function requireVar(vars: TemplateVars, name: string): string {
  const value = vars[name];
  if (value === undefined) throw new Error(`Missing install variable ${name}`);
  return value;
}
