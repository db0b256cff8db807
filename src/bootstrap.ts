/**
 * Loaded before anything else. A bundled launcher may export its own
 * LD_LIBRARY_PATH, which must not leak into platform probes or install
 * subprocesses. A descriptor can still set it through a `run` step's env.
 */
export function scrubInheritedEnv(env: NodeJS.ProcessEnv = process.env): void {
  delete env['LD_LIBRARY_PATH'];
}

scrubInheritedEnv();
