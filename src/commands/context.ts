import { Cache, getCacheRoot } from '../core/cache.js';
import { downloadFile, type Downloader } from '../core/download.js';
import { ConfigLocator, detectRunMode } from '../core/locator.js';
import { Orchestrator } from '../core/orchestrator.js';
import { createPlatformResolver } from '../core/platform.js';
import type { InvocationRequest } from '../types/request.js';
import { createLogger } from '../ui/output.js';
import { withSpinner } from '../ui/spinner.js';

export type GlobalOptions = {
  debug?: boolean;
  platform?: string;
};

export interface CommandRunner {
  run(request: InvocationRequest): Promise<void>;
}

export type RunnerFactory = (globals: GlobalOptions) => CommandRunner;

const spinnerDownload: Downloader = (url, destination) =>
  withSpinner(`Downloading ${url}`, () => downloadFile(url, destination));

/** One cache handle per process, shared by whichever command runs. */
export const createOrchestrator: RunnerFactory = (globals) => {
  const logger = createLogger({ verbose: globals.debug === true });
  return new Orchestrator({
    cache: new Cache(getCacheRoot(), { logger, download: spinnerDownload }),
    logger,
    platforms: createPlatformResolver(),
    locator: new ConfigLocator(detectRunMode()),
  });
};
