import chalk from 'chalk';

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  ok(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  /** Defaults to stderr so stdout only carries command output. */
  write?: (line: string) => void;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { verbose = false } = options;
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));

  return {
    debug: (msg) => {
      if (verbose) write(chalk.gray(`[debug] ${msg}`));
    },
    info: (msg) => write(`${chalk.blue('ℹ')} ${msg}`),
    ok: (msg) => write(`${chalk.green('✓')} ${msg}`),
    warn: (msg) => write(`${chalk.yellow('⚠')} ${msg}`),
    error: (msg) => write(`${chalk.red('✗')} ${msg}`),
  };
}

/** A logger that drops everything; handy for library callers and tests. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  ok: () => {},
  warn: () => {},
  error: () => {},
};

export function reportError(logger: Logger, err: unknown, verbose: boolean): void {
  logger.error(err instanceof Error ? err.message : String(err));
  if (!verbose || !(err instanceof Error)) return;

  if (err.stack) logger.debug(err.stack);
  let cause: unknown = err.cause;
  while (cause !== undefined) {
    logger.debug(`caused by: ${cause instanceof Error ? cause.stack ?? cause.message : String(cause)}`);
    cause = cause instanceof Error ? cause.cause : undefined;
  }
}
