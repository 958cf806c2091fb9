/**
 * Config module exports.
 */

export type { ConfigFile, MergedConfig, LogLevel } from './config-schema.js';
export { DEFAULT_CONFIG, CONFIG_FILE_VERSION, configFileSchema } from './config-schema.js';
export { ConfigLoader, createConfigLoader, loadConfig, CONFIG_FILE_NAME } from './config-loader.js';
