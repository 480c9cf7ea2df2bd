/**
 * Configuration module.
 * Fixed timing bounds plus the zod-validated config file loader.
 */

export { TIMEOUTS, PACING, LIMITS } from './defaults.js';
export {
  loadConfigFile,
  loadOptionalConfigFile,
  DEFAULT_CONFIG_PATH,
} from './loader.js';
export { checkSetup } from './setup.js';
export type { SetupOptions } from './setup.js';
