export { loadConfig, parseConfigYaml, configPath, applyEnvOverrides, formatConfigError } from './loader.js';
export { configSchema, defaultConfig, DEFAULT_CUSTOM_COMMANDS } from './types.js';
export type {
  Config,
  CustomCommand,
  CleanupSettings,
  NotificationSettings,
  CleanupThreshold,
} from './types.js';
