/**
 * Hostbook — Config Defaults
 */

import { join } from 'node:path'
import type { HostbookConfig } from './types.js'

export function defaultConfig(home: string): HostbookConfig {
  return {
    database: {
      path: join(home, 'inventory.db'),
      timeout_ms: 10_000,
    },
    reserved_names: [],
    log: false,
    log_level: 'warn',
  }
}
