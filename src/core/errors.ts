/**
 * Base class for every failure a command can surface to the operator.
 * The CLI prints `message` and exits non-zero; `cause` is shown under --debug.
 */
export class CbdepError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Catalog missing, unreadable or structurally invalid. */
export class ConfigError extends CbdepError {}

export class UnknownPackageError extends CbdepError {
  constructor(
    readonly packageName: string,
    message = `Package "${packageName}" not found in catalog`,
  ) {
    super(message);
  }
}

export class UnsupportedPlatformError extends CbdepError {
  constructor(
    readonly packageName: string,
    readonly version: string,
    readonly platform: string,
    detail = 'no variant for this platform',
  ) {
    super(`Cannot install ${packageName} ${version} on ${platform}: ${detail}`);
  }
}

export class CacheError extends CbdepError {
  constructor(readonly url: string, message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

export class InstallError extends CbdepError {
  constructor(
    readonly packageName: string,
    readonly version: string,
    readonly platform: string,
    reason: string,
    options?: ErrorOptions,
  ) {
    super(`Failed to install ${packageName} ${version} for ${platform}: ${reason}`, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
