import type { Command } from 'commander';
import type { GlobalOptions, RunnerFactory } from './context.js';

type InstallOptions = {
  x32?: boolean;
  configFile?: string;
  dir?: string;
  baseUrl?: string;
  cacheOnly?: boolean;
  report?: boolean;
  output?: string;
  recache?: boolean;
};

export function registerInstall(program: Command, factory: RunnerFactory): void {
  program
    .command('install')
    .description('Install a package')
    .argument('<package>', 'Package to install')
    .argument('<version>', 'Version to install')
    .option('-3, --x32', 'Download 32-bit package (only works on a few packages)')
    .option('-c, --config-file <path>', 'YAML file descriptor')
    .option('-d, --dir <path>', 'Directory to unpack into (not applicable for all packages)')
    .option('-b, --base-url <url>', 'Alternate base URL for downloading dep (only applicable to a few packages)')
    .option('-n, --cache-only', 'Only download any installer files, do not install')
    .option('-r, --report', 'Report the filename in the cache (only last-downloaded file in case of multiple downloads)')
    .option('-o, --output <path>', 'Output cached file to a local file (only last-downloaded file in case of multiple downloads)')
    .option('--recache', 'Re-download any installer files to cache, replacing files in cache')
    .action(async (pkg: string, version: string, _opts: InstallOptions, cmd: Command) => {
      const opts = cmd.optsWithGlobals<InstallOptions & GlobalOptions>();
      await factory(opts).run({
        kind: 'install',
        package: pkg,
        version,
        platform: opts.platform,
        x32: opts.x32 === true,
        baseUrl: opts.baseUrl,
        installDir: opts.dir,
        configFile: opts.configFile,
        cacheOnly: opts.cacheOnly === true,
        recache: opts.recache === true,
        report: opts.report === true,
        output: opts.output,
      });
    });
}
