/**
 * Barrel exports for the config module.
 */

export { loadLifecycleConfig, toPollerSettings } from './config-loader.js'
export type { LoadConfigOptions, PollerSettings } from './config-loader.js'
export {
  LifecycleConfigSchema,
  PartialLifecycleConfigSchema,
  PollingSettingsSchema,
  LogLevelSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
} from './config-schema.js'
export type {
  LifecycleConfig,
  PartialLifecycleConfig,
  PollingSettings,
  LogLevelValue,
} from './config-schema.js'
export { DEFAULT_CONFIG, DEFAULT_POLLING } from './defaults.js'
