/**
 * Configuration module.
 * Loads and validates runtime config from env, CLI flags, and config files.
 * Zod-validated.
 */

export { TIMING, EXIT_CODES } from './defaults.js';
export {
  loadConfigFile,
  loadOptionalConfigFile,
  loadEnvConfig,
} from './loader.js';
