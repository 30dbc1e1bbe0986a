/**
 * Configuration module exports
 */

export {
  resolveStoreConfig,
  findConfigPath,
  loadConfigFile,
  CONFIG_FILE,
  DEFAULT_SERVER,
  DEFAULT_NAMESPACE,
  type ConfigSource,
  type StoreSettings,
  type StoreConfigFile,
  type StoreConfigOptions,
  type StoreConfigResolution,
} from './store.js';
