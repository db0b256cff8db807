import type { Command } from 'commander';
import type { GlobalOptions, RunnerFactory } from './context.js';

type ListOptions = {
  configFile?: string;
};

export function registerList(program: Command, factory: RunnerFactory): void {
  program
    .command('list')
    .description('List available cbdep packages')
    .option('-c, --config-file <path>', 'YAML file descriptor')
    .action(async (_opts: ListOptions, cmd: Command) => {
      const opts = cmd.optsWithGlobals<ListOptions & GlobalOptions>();
      await factory(opts).run({ kind: 'list', configFile: opts.configFile });
    });
}
