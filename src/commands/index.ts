export { registerCache } from './cache.js';
export { registerInstall } from './install.js';
export { registerPlatform } from './platform.js';
export { registerList } from './list.js';
export {
  createOrchestrator,
  type CommandRunner,
  type GlobalOptions,
  type RunnerFactory,
} from './context.js';
