/**
 * Built-in default values for the lifecycle configuration.
 *
 * Lowest priority; overridden by the YAML config file, then by environment
 * variables.
 */

import type { LifecycleConfig, PollingSettings } from './config-schema.js'

/** One status query per second, for at most sixty queries */
export const DEFAULT_POLLING: PollingSettings = {
  interval_ms: 1_000,
  max_attempts: 60,
}

export const DEFAULT_CONFIG: LifecycleConfig = {
  config_format_version: '1',
  polling: DEFAULT_POLLING,
  log_level: 'info',
}
