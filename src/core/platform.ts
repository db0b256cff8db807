import { readFileSync } from 'node:fs';

export interface PlatformResolver {
  /** Most specific platform id for this host, e.g. `ubuntu22.04`, `macos`. */
  detect(): string;
  /** Canonical CPU architecture, e.g. `x86_64`, `aarch64`. */
  arch(): string;
}

const OS_RELEASE_PATH = '/etc/os-release';

const LINUX_DISTROS = new Set([
  'alpine',
  'amzn',
  'centos',
  'debian',
  'fedora',
  'linuxmint',
  'ol',
  'opensuse-leap',
  'rhel',
  'rocky',
  'sles',
  'ubuntu',
]);

const ARCH_NAMES: Record<string, string> = {
  x64: 'x86_64',
  arm64: 'aarch64',
  ia32: 'x86',
};

// ── os-release ──────────────────────────────────────────────────────

export function parseOsRelease(raw: string): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const line of raw.split('\n')) {
    const match = /^([A-Z0-9_]+)=(.*)$/.exec(line.trim());
    if (!match) continue;
    const [, key, value] = match;
    if (key === undefined || value === undefined) continue;
    fields[key] = value.replace(/^(["'])(.*)\1$/, '$2');
  }
  return fields;
}

function readOsRelease(): string | null {
  try {
    return readFileSync(OS_RELEASE_PATH, 'utf-8');
  } catch {
    return null;
  }
}

export function linuxPlatformId(osRelease: string | null): string {
  if (osRelease === null) return 'linux';
  const fields = parseOsRelease(osRelease);
  const id = fields['ID']?.toLowerCase();
  if (!id) return 'linux';
  return `${id}${fields['VERSION_ID'] ?? ''}`;
}

// ── Candidates ──────────────────────────────────────────────────────

/**
 * Platform ids a descriptor may list for this platform, most specific first:
 * `ubuntu22.04` → `ubuntu22.04`, `ubuntu`, `linux`.
 */
export function platformCandidates(id: string): string[] {
  if (LINUX_DISTROS.has(id)) return [id, 'linux'];

  const match = /^([a-z][a-z-]*?)(\d[\w.]*)$/.exec(id);
  const distro = match?.[1];
  if (distro !== undefined && LINUX_DISTROS.has(distro)) {
    return [id, distro, 'linux'];
  }
  return [id];
}

// ── Resolver ────────────────────────────────────────────────────────

export interface PlatformSource {
  platform?: NodeJS.Platform;
  arch?: string;
  /** os-release contents; `null` when unreadable. Read from disk when omitted. */
  osRelease?: string | null;
}

export function createPlatformResolver(source: PlatformSource = {}): PlatformResolver {
  const platform = source.platform ?? process.platform;
  const arch = source.arch ?? process.arch;

  return {
    detect: () => {
      switch (platform) {
        case 'linux':
          return linuxPlatformId(
            source.osRelease !== undefined ? source.osRelease : readOsRelease(),
          );
        case 'darwin':
          return 'macos';
        case 'win32':
          return 'windows';
        default:
          return platform;
      }
    },
    arch: () => ARCH_NAMES[arch] ?? arch,
  };
}

/** `os` template variable: the family name most download sites use. */
export function osFamily(platformId: string): string {
  if (platformId === 'macos') return 'darwin';
  if (platformId === 'windows') return 'windows';
  return platformCandidates(platformId).includes('linux') ? 'linux' : platformId;
}
