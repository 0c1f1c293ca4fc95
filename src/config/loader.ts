/**
 * Hostbook — Config Loader
 *
 * Loads <home>/config.yaml, merges it over the defaults,
 * then applies environment overrides. A missing file means defaults.
 */

import { readFileSync, existsSync } from 'node:fs'
import { parse as parseYaml } from 'yaml'
import { ConfigError } from '../errors.js'
import { isLogLevel } from '../log/logger.js'
import { defaultConfig } from './defaults.js'
import { configFile, expandHome, homeDir } from './paths.js'
import type { HostbookConfig } from './types.js'

export type LoadConfigOptions = {
  /** Explicit config file; it must exist */
  path?: string
  env?: NodeJS.ProcessEnv
}

type Fields = Record<string, unknown>

function isRecord(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function fail(file: string, message: string): never {
  throw new ConfigError(`Invalid config ${file}: ${message}`, { file })
}

/** Merge a parsed config file over `base`, checking each field's type */
function mergeConfig(base: HostbookConfig, parsed: Fields, file: string): HostbookConfig {
  const config: HostbookConfig = { ...base, database: { ...base.database } }

  const { database, reserved_names, log, log_level } = parsed
  if (database !== undefined) {
    if (!isRecord(database)) fail(file, 'database must be a mapping')
    if (database.path !== undefined) {
      if (typeof database.path !== 'string' || !database.path) fail(file, 'database.path must be a non-empty string')
      config.database.path = database.path
    }
    if (database.timeout_ms !== undefined) {
      if (typeof database.timeout_ms !== 'number' || database.timeout_ms < 0) {
        fail(file, 'database.timeout_ms must be a non-negative number')
      }
      config.database.timeout_ms = database.timeout_ms
    }
  }

  if (reserved_names !== undefined) {
    if (!Array.isArray(reserved_names) || !reserved_names.every((n) => typeof n === 'string')) {
      fail(file, 'reserved_names must be a list of strings')
    }
    config.reserved_names = reserved_names
  }

  if (log !== undefined) {
    if (typeof log !== 'boolean') fail(file, 'log must be true or false')
    config.log = log
  }

  if (log_level !== undefined) {
    if (!isLogLevel(log_level)) fail(file, 'log_level must be one of debug, info, warn, error')
    config.log_level = log_level
  }

  return config
}

function readConfigFile(file: string): Fields {
  let raw: string
  try {
    raw = readFileSync(file, 'utf-8')
  } catch (err) {
    throw new ConfigError(`Cannot read config ${file}: ${err instanceof Error ? err.message : String(err)}`, { file })
  }

  let parsed: unknown
  try {
    parsed = parseYaml(raw)
  } catch (err) {
    throw new ConfigError(`Invalid config ${file}: ${err instanceof Error ? err.message : String(err)}`, { file })
  }

  // an empty file parses to null
  if (parsed === null || parsed === undefined) return {}
  if (!isRecord(parsed)) fail(file, 'top level must be a mapping')
  return parsed
}

/** Load config from <home>/config.yaml (or `options.path`), merged with defaults */
export function loadConfig(options: LoadConfigOptions = {}): HostbookConfig {
  const env = options.env ?? process.env
  const home = homeDir(env)
  const file = options.path ?? env.HOSTBOOK_CONFIG ?? configFile(home)
  const explicit = options.path !== undefined || env.HOSTBOOK_CONFIG !== undefined

  let config = defaultConfig(home)
  if (explicit || existsSync(file)) {
    config = mergeConfig(config, readConfigFile(file), file)
  }

  if (env.HOSTBOOK_DB) config.database.path = env.HOSTBOOK_DB
  if (env.HOSTBOOK_LOG_LEVEL !== undefined) {
    if (!isLogLevel(env.HOSTBOOK_LOG_LEVEL)) {
      throw new ConfigError(`HOSTBOOK_LOG_LEVEL must be one of debug, info, warn, error`)
    }
    config.log_level = env.HOSTBOOK_LOG_LEVEL
  }

  config.database.path = expandHome(config.database.path)
  return config
}
