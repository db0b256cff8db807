#!/usr/bin/env node
import './bootstrap.js';
import { createProgram } from './program.js';
import { createLogger, reportError } from './ui/output.js';

const program = createProgram();

try {
  await program.parseAsync();
} catch (err) {
  const debug = program.opts<{ debug?: boolean }>().debug === true;
  reportError(createLogger({ verbose: debug }), err, debug);
  process.exit(1);
}
