/**
 * Hostbook — Config Types
 */

import type { LogLevel } from '../log/logger.js'

export type DatabaseConfig = {
  path: string
  timeout_ms: number
}

export type HostbookConfig = {
  database: DatabaseConfig
  /** Host names `add` refuses, on top of the built-in ones */
  reserved_names: string[]
  log: boolean
  log_level: LogLevel
}
