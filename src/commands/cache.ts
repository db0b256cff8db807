import type { Command } from 'commander';
import type { GlobalOptions, RunnerFactory } from './context.js';

type CacheOptions = {
  report?: boolean;
  recache?: boolean;
  output?: string;
};

export function registerCache(program: Command, factory: RunnerFactory): void {
  program
    .command('cache')
    .description('Add downloaded URL to local cache')
    .argument('<url>', 'URL to cache')
    .option('-r, --report', 'Report the filename in the cache')
    .option('--recache', 'Re-download URL, replacing files in cache')
    .option('-o, --output <path>', 'Output cached file to a local file')
    .action(async (url: string, _opts: CacheOptions, cmd: Command) => {
      const opts = cmd.optsWithGlobals<CacheOptions & GlobalOptions>();
      await factory(opts).run({
        kind: 'cache',
        url,
        recache: opts.recache === true,
        report: opts.report === true,
        output: opts.output,
      });
    });
}
