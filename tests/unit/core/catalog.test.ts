import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { rmSync } from 'node:fs';
import { join } from 'node:path';
import {
  LIST_HEADER,
  formatPackageList,
  listPackageNames,
  loadCatalog,
  lookupEntry,
  parseCatalog,
} from '../../../src/core/catalog.js';
import { ConfigError } from '../../../src/core/errors.js';
import { makeTempDir, writeCatalog } from '../fixtures.js';

const CATALOG = `
packages:
  foo:
    variants:
      - platforms: [linux]
        url: https://example.test/foo-\${version}.tgz
  bar:
    description: Bar tool
    variants:
      - platforms: [macos]
        url: https://example.test/bar.zip
classic-cbdeps:
  packages: [baz]
`;

describe('catalog', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir('catalog');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('loadCatalog', () => {
    it('loads detailed and legacy entries', () => {
      const catalog = loadCatalog(writeCatalog(dir, CATALOG));
      expect(catalog.entries.size).toBe(3);
      expect(lookupEntry(catalog, 'foo')?.kind).toBe('detailed');
      expect(lookupEntry(catalog, 'baz')).toEqual({ kind: 'legacy', name: 'baz' });
    });

    it('keeps descriptor fields', () => {
      const catalog = loadCatalog(writeCatalog(dir, CATALOG));
      const entry = lookupEntry(catalog, 'bar');
      expect(entry?.kind).toBe('detailed');
      if (entry?.kind === 'detailed') {
        expect(entry.descriptor.description).toBe('Bar tool');
        expect(entry.descriptor.variants[0]?.url).toBe('https://example.test/bar.zip');
      }
    });

    it('throws ConfigError for a missing file', () => {
      const path = join(dir, 'absent.config');
      expect(() => loadCatalog(path)).toThrow(ConfigError);
      expect(() => loadCatalog(path)).toThrow(`Cannot read config file ${path}`);
    });

    it('returns undefined for unknown names', () => {
      const catalog = loadCatalog(writeCatalog(dir, CATALOG));
      expect(lookupEntry(catalog, 'nope')).toBeUndefined();
    });
  });

  describe('parseCatalog', () => {
    it('rejects a catalog without classic-cbdeps', () => {
      const raw = 'packages: {}\n';
      expect(() => parseCatalog(raw, 'x.config')).toThrow(
        'Config file x.config is malformed: classic-cbdeps: Required',
      );
    });

    it('rejects a catalog without packages', () => {
      const raw = 'classic-cbdeps:\n  packages: []\n';
      expect(() => parseCatalog(raw, 'x.config')).toThrow(ConfigError);
    });

    it('rejects invalid YAML', () => {
      expect(() => parseCatalog('packages: [[', 'x.config')).toThrow(
        /^Config file x\.config is not valid YAML/,
      );
    });

    it('rejects a variant without platforms', () => {
      const raw = `
packages:
  foo:
    variants:
      - url: https://example.test/foo.tgz
classic-cbdeps:
  packages: []
`;
      expect(() => parseCatalog(raw, 'x.config')).toThrow(
        'packages.foo.variants.0.platforms: Required',
      );
    });

    it('rejects an unknown action', () => {
      const raw = `
packages:
  foo:
    variants:
      - platforms: [linux]
        url: https://example.test/foo.tgz
        actions:
          - action: explode
classic-cbdeps:
  packages: []
`;
      expect(() => parseCatalog(raw, 'x.config')).toThrow(ConfigError);
    });

    it('treats a name in both sections as one detailed entry', () => {
      const raw = `
packages:
  foo:
    variants:
      - platforms: [linux]
        url: https://example.test/foo.tgz
classic-cbdeps:
  packages: [foo, qux]
`;
      const catalog = parseCatalog(raw, 'x.config');
      expect(listPackageNames(catalog)).toEqual(['foo', 'qux']);
      expect(lookupEntry(catalog, 'foo')?.kind).toBe('detailed');
    });
  });

  describe('listPackageNames', () => {
    it('returns the sorted union of both sections', () => {
      const catalog = parseCatalog(CATALOG, 'x.config');
      expect(listPackageNames(catalog)).toEqual(['bar', 'baz', 'foo']);
    });
  });

  describe('formatPackageList', () => {
    it('adds the header, indentation and trailing blank line', () => {
      const catalog = parseCatalog(CATALOG, 'x.config');
      expect(formatPackageList(catalog)).toEqual([
        LIST_HEADER,
        '  bar',
        '  baz',
        '  foo',
        '',
      ]);
    });
  });
});
