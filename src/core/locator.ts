import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { CONFIG_FILE } from '../config/branding.js';

declare const __BUNDLED__: boolean;

// ── Run mode ────────────────────────────────────────────────────────

/**
 * `bundled`: running from the tsup bundle, which carries cbdep.config beside it.
 * `live`: running from a source checkout; the catalog lives in the home directory.
 */
export type RunMode = 'bundled' | 'live';

export function detectRunMode(): RunMode {
  return typeof __BUNDLED__ !== 'undefined' && __BUNDLED__ ? 'bundled' : 'live';
}

export function bundleDir(): string {
  return dirname(fileURLToPath(import.meta.url));
}

// ── Locator ─────────────────────────────────────────────────────────

export interface LocatorDirs {
  bundleDir: string;
  homeDir: string;
}

export class ConfigLocator {
  constructor(
    readonly mode: RunMode,
    private readonly dirs: LocatorDirs = { bundleDir: bundleDir(), homeDir: homedir() },
  ) {}

  /** No existence check: a missing file surfaces when the catalog is opened. */
  resolve(explicitPath?: string): string {
    if (explicitPath !== undefined) return explicitPath;
    const dir = this.mode === 'bundled' ? this.dirs.bundleDir : this.dirs.homeDir;
    return join(dir, CONFIG_FILE);
  }
}
