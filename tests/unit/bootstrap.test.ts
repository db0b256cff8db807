import { describe, it, expect } from 'vitest';
import { scrubInheritedEnv } from '../../src/bootstrap.js';

describe('scrubInheritedEnv', () => {
  it('removes LD_LIBRARY_PATH and keeps the rest', () => {
    const env: NodeJS.ProcessEnv = { LD_LIBRARY_PATH: '/opt/bundle/lib', PATH: '/usr/bin' };
    scrubInheritedEnv(env);
    expect(env).toEqual({ PATH: '/usr/bin' });
  });

  it('has already run for this process', () => {
    expect(process.env['LD_LIBRARY_PATH']).toBeUndefined();
  });
});
