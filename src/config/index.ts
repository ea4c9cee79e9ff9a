export type {
  PipesmithConfig,
  ServerConfig,
  ExecutorConfig,
  StoreConfig,
  PartialPipesmithConfig,
  CliConfigOverrides,
} from './types.js';
export { getDefaultConfig, DEFAULT_PYTHON_IMAGE } from './defaults.js';
export { loadConfig, loadConfigFromPath, loadEnvConfig, mergeConfig, ConfigError, type TLoadConfigOptions } from './loader.js';
export { PipesmithConfigSchema, ConfigFileSchema } from './schema.js';
