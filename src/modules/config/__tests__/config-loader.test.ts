/**
 * Tests for loadLifecycleConfig and toPollerSettings
 *
 * Config files are written to a fresh temp directory per test.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile, mkdir } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { ConfigurationError } from '../../../core/errors.js'
import { loadLifecycleConfig, toPollerSettings } from '../config-loader.js'
import { DEFAULT_CONFIG } from '../defaults.js'

describe('loadLifecycleConfig', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'lifecycle-config-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  async function writeConfig(contents: string): Promise<string> {
    const configPath = join(dir, 'lifecycle.yaml')
    await writeFile(configPath, contents, 'utf-8')
    return configPath
  }

  it('returns the defaults when nothing overrides them', async () => {
    await expect(loadLifecycleConfig({ env: {} })).resolves.toEqual(DEFAULT_CONFIG)
  })

  it('treats a missing config file as empty', async () => {
    const config = await loadLifecycleConfig({ configPath: join(dir, 'absent.yaml'), env: {} })

    expect(config).toEqual(DEFAULT_CONFIG)
  })

  it('treats an empty config file as empty', async () => {
    const configPath = await writeConfig('')

    await expect(loadLifecycleConfig({ configPath, env: {} })).resolves.toEqual(DEFAULT_CONFIG)
  })

  it('merges file values over the defaults', async () => {
    const configPath = await writeConfig('polling:\n  interval_ms: 250\nlog_level: debug\n')

    const config = await loadLifecycleConfig({ configPath, env: {} })

    expect(config.polling).toEqual({ interval_ms: 250, max_attempts: 60 })
    expect(config.log_level).toBe('debug')
  })

  it('lets environment variables win over the file', async () => {
    const configPath = await writeConfig('polling:\n  interval_ms: 250\n  max_attempts: 10\n')

    const config = await loadLifecycleConfig({
      configPath,
      env: { LIFECYCLE_POLL_INTERVAL_MS: '500', LIFECYCLE_LOG_LEVEL: 'error' },
    })

    expect(config.polling).toEqual({ interval_ms: 500, max_attempts: 10 })
    expect(config.log_level).toBe('error')
  })

  it('rejects a non-integer environment override with its path', async () => {
    const loading = loadLifecycleConfig({ env: { LIFECYCLE_MAX_POLL_ATTEMPTS: 'lots' } })

    await expect(loading).rejects.toBeInstanceOf(ConfigurationError)
    await expect(loading).rejects.toThrow(/^Invalid environment overrides: polling\.max_attempts: /)
  })

  it('rejects an unknown key in the file', async () => {
    const configPath = await writeConfig('polling:\n  interval: 5\n')

    await expect(loadLifecycleConfig({ configPath, env: {} })).rejects.toThrow(
      `Invalid config file ${configPath}: polling: Unrecognized key(s) in object: 'interval'`,
    )
  })

  it('rejects a zero attempt budget', async () => {
    const configPath = await writeConfig('polling:\n  max_attempts: 0\n')

    await expect(loadLifecycleConfig({ configPath, env: {} })).rejects.toThrow(/polling\.max_attempts/)
  })

  it('reports malformed YAML', async () => {
    const configPath = await writeConfig('polling: [unclosed\n')

    await expect(loadLifecycleConfig({ configPath, env: {} })).rejects.toThrow(/^Invalid YAML in config file: /)
  })

  it('reports a config path that cannot be read', async () => {
    const configPath = join(dir, 'nested')
    await mkdir(configPath)

    await expect(loadLifecycleConfig({ configPath, env: {} })).rejects.toThrow(/^Cannot read config file: /)
  })
})

describe('toPollerSettings', () => {
  it('maps the polling section to poller settings', () => {
    expect(
      toPollerSettings({ ...DEFAULT_CONFIG, polling: { interval_ms: 250, max_attempts: 5 } }),
    ).toEqual({ pollIntervalMs: 250, maxAttempts: 5 })
  })
})
