/**
 * Config loader — resolves the lifecycle configuration in priority order.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → YAML config file   (LoadConfigOptions.configPath, optional)
 *     → environment vars    (LIFECYCLE_* prefixed)
 *
 * The merged document is validated against LifecycleConfigSchema; any problem
 * surfaces as a ConfigurationError listing the offending paths.
 */

import { readFile } from 'node:fs/promises'
import yaml from 'js-yaml'
import type { ZodIssue } from 'zod'
import { ConfigurationError, toErrorMessage } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import {
  LifecycleConfigSchema,
  PartialLifecycleConfigSchema,
  type LifecycleConfig,
  type PartialLifecycleConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG } from './defaults.js'

const logger = createLogger('config')

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface LoadConfigOptions {
  /** Path to a YAML file; a missing file is not an error */
  configPath?: string
  /** Environment to read overrides from (defaults to process.env) */
  env?: NodeJS.ProcessEnv
}

/** Settings handed to the prediction poller */
export interface PollerSettings {
  pollIntervalMs: number
  maxAttempts: number
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

const INTEGER_PATTERN = /^\d+$/

/**
 * Read LIFECYCLE_* variables into a partial overlay. Values that are not
 * integers where integers are expected are passed through as strings so the
 * schema rejects them with a precise path.
 */
function readEnvOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {}
  const polling: Record<string, unknown> = {}

  const interval = env.LIFECYCLE_POLL_INTERVAL_MS
  if (interval !== undefined) {
    polling.interval_ms = INTEGER_PATTERN.test(interval) ? parseInt(interval, 10) : interval
  }

  const attempts = env.LIFECYCLE_MAX_POLL_ATTEMPTS
  if (attempts !== undefined) {
    polling.max_attempts = INTEGER_PATTERN.test(attempts) ? parseInt(attempts, 10) : attempts
  }

  if (Object.keys(polling).length > 0) overrides.polling = polling

  const level = env.LIFECYCLE_LOG_LEVEL
  if (level !== undefined) overrides.log_level = level

  return overrides
}

// ---------------------------------------------------------------------------
// File loading
// ---------------------------------------------------------------------------

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

async function readConfigFile(configPath: string): Promise<unknown> {
  let raw: string
  try {
    raw = await readFile(configPath, 'utf-8')
  } catch (err) {
    if (isMissingFile(err)) {
      logger.debug({ configPath }, 'No config file found, using defaults')
      return {}
    }
    throw new ConfigurationError(`Cannot read config file: ${toErrorMessage(err)}`, { configPath })
  }

  try {
    // An empty YAML document parses to undefined
    return yaml.load(raw) ?? {}
  } catch (err) {
    throw new ConfigurationError(`Invalid YAML in config file: ${toErrorMessage(err)}`, { configPath })
  }
}

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ')
}

function parseOverlay(source: string, value: unknown): PartialLifecycleConfig {
  const parsed = PartialLifecycleConfigSchema.safeParse(value)
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${source}: ${formatIssues(parsed.error.issues)}`, {
      source,
      issues: parsed.error.issues,
    })
  }
  return parsed.data
}

function applyOverlay(base: LifecycleConfig, overlay: PartialLifecycleConfig): LifecycleConfig {
  return {
    config_format_version: overlay.config_format_version ?? base.config_format_version,
    polling: {
      interval_ms: overlay.polling?.interval_ms ?? base.polling.interval_ms,
      max_attempts: overlay.polling?.max_attempts ?? base.polling.max_attempts,
    },
    log_level: overlay.log_level ?? base.log_level,
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Resolve the effective configuration.
 *
 * @throws {ConfigurationError} when the file cannot be read or parsed, or when
 *   the merged document violates the schema.
 */
export async function loadLifecycleConfig(options: LoadConfigOptions = {}): Promise<LifecycleConfig> {
  let config = DEFAULT_CONFIG

  if (options.configPath !== undefined) {
    const fromFile = await readConfigFile(options.configPath)
    config = applyOverlay(config, parseOverlay(`config file ${options.configPath}`, fromFile))
  }

  config = applyOverlay(config, parseOverlay('environment overrides', readEnvOverrides(options.env ?? process.env)))

  const validated = LifecycleConfigSchema.safeParse(config)
  if (!validated.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(validated.error.issues)}`, {
      issues: validated.error.issues,
    })
  }

  logger.debug({ polling: validated.data.polling, logLevel: validated.data.log_level }, 'Configuration loaded')
  return validated.data
}

/** Map the config document to poller settings */
export function toPollerSettings(config: LifecycleConfig): PollerSettings {
  return {
    pollIntervalMs: config.polling.interval_ms,
    maxAttempts: config.polling.max_attempts,
  }
}
