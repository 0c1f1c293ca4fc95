import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { homedir, tmpdir } from 'node:os'
import { join } from 'node:path'
import { ConfigError } from '../errors.js'
import { loadConfig } from './loader.js'

describe('loadConfig', () => {
  let dir: string
  let file: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'hostbook-config-'))
    file = join(dir, 'config.yaml')
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('merges the file over the defaults', () => {
    writeFileSync(file, 'database:\n  path: /srv/inventory.db\nreserved_names: [gateway]\n')

    const config = loadConfig({ path: file, env: {} })

    expect(config).toEqual({
      database: { path: '/srv/inventory.db', timeout_ms: 10_000 },
      reserved_names: ['gateway'],
      log: false,
      log_level: 'warn',
    })
  })

  it('treats an empty file as defaults', () => {
    writeFileSync(file, '')

    expect(loadConfig({ path: file, env: {} }).log_level).toBe('warn')
  })

  it('lets the environment override the file', () => {
    writeFileSync(file, 'database:\n  path: /srv/inventory.db\nlog_level: info\n')

    const config = loadConfig({ path: file, env: { HOSTBOOK_DB: '/tmp/other.db', HOSTBOOK_LOG_LEVEL: 'debug' } })

    expect(config.database.path).toBe('/tmp/other.db')
    expect(config.log_level).toBe('debug')
  })

  it('reads the file named by HOSTBOOK_CONFIG', () => {
    writeFileSync(file, 'log: true\n')

    expect(loadConfig({ env: { HOSTBOOK_CONFIG: file } }).log).toBe(true)
  })

  it('finds config.yaml and the default database under HOSTBOOK_HOME', () => {
    writeFileSync(file, 'log_level: error\n')

    const config = loadConfig({ env: { HOSTBOOK_HOME: dir } })

    expect(config.log_level).toBe('error')
    expect(config.database.path).toBe(join(dir, 'inventory.db'))
  })

  it('falls back to defaults when HOSTBOOK_HOME has no config file', () => {
    expect(loadConfig({ env: { HOSTBOOK_HOME: dir } })).toEqual({
      database: { path: join(dir, 'inventory.db'), timeout_ms: 10_000 },
      reserved_names: [],
      log: false,
      log_level: 'warn',
    })
  })

  it('expands ~ in the database path', () => {
    writeFileSync(file, 'database:\n  path: ~/inv.db\n')

    expect(loadConfig({ path: file, env: {} }).database.path).toBe(join(homedir(), 'inv.db'))
  })

  it('rejects a missing explicit file', () => {
    expect(() => loadConfig({ path: join(dir, 'missing.yaml'), env: {} })).toThrow(ConfigError)
  })

  it('rejects malformed YAML', () => {
    writeFileSync(file, 'database: [unclosed\n')

    expect(() => loadConfig({ path: file, env: {} })).toThrow(ConfigError)
  })

  it('rejects fields of the wrong type', () => {
    writeFileSync(file, 'database:\n  timeout_ms: soon\n')

    expect(() => loadConfig({ path: file, env: {} })).toThrow(
      `Invalid config ${file}: database.timeout_ms must be a non-negative number`,
    )
  })

  it('rejects an unknown log level', () => {
    writeFileSync(file, 'log_level: loud\n')
    expect(() => loadConfig({ path: file, env: {} })).toThrow(ConfigError)
  })
})
