export const APP_NAME = 'cbdep';
export const DESCRIPTION = 'Dependency Management System';
export const CONFIG_FILE = 'cbdep.config';
export const CACHE_DIR = '.cbdepcache';
export const ENV_PREFIX = 'CBDEP';

declare const __VERSION__: string;

export function envVar(suffix: string): string {
  return `${ENV_PREFIX}_${suffix.toUpperCase()}`;
}

export function currentVersion(): string {
  return typeof __VERSION__ !== 'undefined' ? __VERSION__ : 'dev';
}
