import type { Command } from 'commander';
import type { GlobalOptions, RunnerFactory } from './context.js';

export function registerPlatform(program: Command, factory: RunnerFactory): void {
  program
    .command('platform')
    .description('Dump introspected platform information')
    .action(async (_opts: object, cmd: Command) => {
      await factory(cmd.optsWithGlobals<GlobalOptions>()).run({ kind: 'platform' });
    });
}
