/**
 * Configuration Module
 * ====================
 *
 * Configuration schema and loading utilities
 */

export { loadConfig, parseConfig, applyEnvOverrides, readConfigFile, DEFAULT_CONFIG_PATH } from './loader';
export { BridgeConfigSchema } from './schema';
export type {
  BridgeConfig,
  BacnetConfig,
  ForeignDeviceConfig,
  DiscoveryConfig,
  PollingConfig,
  MqttConfig,
  StorageConfig,
  ApiConfig,
  LoggingConfig
} from './schema';
