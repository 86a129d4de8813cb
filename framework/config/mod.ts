/**
 * Configuration & Environment Management
 *
 * View settings, log level and environment overrides.
 */

export {
  Config,
  ConfigError,
  loadConfig,
  type ConfigOptions,
  type ViewSettings,
} from './config.ts';
