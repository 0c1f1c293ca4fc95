/**
 * Hostbook — Home Directory
 *
 * `HOSTBOOK_HOME` wins; otherwise `%APPDATA%\hostbook` on Windows and
 * `~/.hostbook` elsewhere. The config file, default database and log
 * directory all live under it.
 */

import { join } from 'node:path'
import { homedir } from 'node:os'

export function homeDir(env: NodeJS.ProcessEnv = process.env, platform: NodeJS.Platform = process.platform): string {
  if (env.HOSTBOOK_HOME) return expandHome(env.HOSTBOOK_HOME)
  if (platform === 'win32') {
    return join(env.APPDATA || join(homedir(), 'AppData', 'Roaming'), 'hostbook')
  }
  return join(homedir(), '.hostbook')
}

export const configFile = (home: string): string => join(home, 'config.yaml')
export const logDir = (home: string): string => join(home, 'logs')

/** Expand a leading `~` the way a shell would */
export function expandHome(path: string): string {
  if (path === '~') return homedir()
  if (path.startsWith('~/')) return join(homedir(), path.slice(2))
  return path
}
