/**
 * Config module exports.
 */

export type { DistillerFileConfig, RuntimeConfig, RuntimeConfigFile } from './config-schema.js';
export {
  CONFIG_FILE_VERSION,
  DEFAULT_CONFIG,
  distillerConfigSchema,
  logLevelSchema,
  runtimeConfigSchema,
} from './config-schema.js';
export { CONFIG_FILE_NAME, ConfigLoader, createConfigLoader, loadConfig } from './config-loader.js';
