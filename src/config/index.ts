/**
 * Configuration Module
 */

export {
  LogLevelSchema,
  ConfigFileSchema,
  DepotTrustConfigSchema,
  ENV,
  type LogLevel,
  type ConfigFile,
  type DepotTrustConfig,
} from './types';

export {
  loadConfig,
  loadConfigFile,
  getDefaultTrustFile,
  type Environment,
  type LoadConfigOptions,
} from './loader';
