import { Command } from 'commander';
import { APP_NAME, DESCRIPTION, currentVersion } from './config/branding.js';
import {
  createOrchestrator,
  registerCache,
  registerInstall,
  registerList,
  registerPlatform,
  type RunnerFactory,
} from './commands/index.js';

export function createProgram(factory: RunnerFactory = createOrchestrator): Command {
  const program = new Command()
    .name(APP_NAME)
    .description(DESCRIPTION)
    .version(currentVersion())
    .option('-d, --debug', 'Enable debugging output')
    .option('-p, --platform <platform>', 'Override detected platform')
    // Global flags come before the subcommand, so `install -d` can mean --dir
    .enablePositionalOptions()
    .showHelpAfterError(true);

  registerCache(program, factory);
  registerInstall(program, factory);
  registerPlatform(program, factory);
  registerList(program, factory);

  return program;
}
