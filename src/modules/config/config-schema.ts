/**
 * Zod validation schemas for the lifecycle configuration document.
 *
 * Defines schemas for:
 *  - polling settings (interval and attempt budget per job)
 *  - logging level
 *  - the full config document and its partial (overlay) form
 */

import { z } from 'zod'

export const CURRENT_CONFIG_FORMAT_VERSION = '1'

// ---------------------------------------------------------------------------
// Polling
// ---------------------------------------------------------------------------

export const PollingSettingsSchema = z
  .object({
    /** Wait between two status queries for the same job */
    interval_ms: z.number().int().min(0),
    /** Non-terminal responses tolerated before the job is declared timed out */
    max_attempts: z.number().int().min(1),
  })
  .strict()

export type PollingSettings = z.infer<typeof PollingSettingsSchema>

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

// ---------------------------------------------------------------------------
// Full document
// ---------------------------------------------------------------------------

export const LifecycleConfigSchema = z
  .object({
    config_format_version: z.literal(CURRENT_CONFIG_FORMAT_VERSION),
    polling: PollingSettingsSchema,
    log_level: LogLevelSchema,
  })
  .strict()

export type LifecycleConfig = z.infer<typeof LifecycleConfigSchema>

/** Overlay form: every key optional, used for files and environment overrides */
export const PartialLifecycleConfigSchema = z
  .object({
    config_format_version: z.literal(CURRENT_CONFIG_FORMAT_VERSION).optional(),
    polling: PollingSettingsSchema.partial().strict().optional(),
    log_level: LogLevelSchema.optional(),
  })
  .strict()

export type PartialLifecycleConfig = z.infer<typeof PartialLifecycleConfigSchema>
