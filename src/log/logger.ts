/**
 * Hostbook — Logger
 *
 * Level-filtered lines on stderr (stdout carries the JSON output),
 * optionally appended to a dated file under ~/.hostbook/logs.
 */

import { mkdirSync, appendFileSync } from 'node:fs'
import { join } from 'node:path'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

export type LogContext = Record<string, unknown>

export interface Logger {
  debug(msg: string, ctx?: LogContext): void
  info(msg: string, ctx?: LogContext): void
  warn(msg: string, ctx?: LogContext): void
  error(msg: string, ctx?: LogContext): void
}

export type LoggerOptions = {
  level?: LogLevel
  /** Directory for the dated log file; no file when unset */
  dir?: string
  /** Where console lines go */
  write?: (line: string) => void
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((l) => l === value)
}

function logPath(dir: string): string {
  const date = new Date().toISOString().slice(0, 10) // YYYY-MM-DD
  return join(dir, `hostbook-${date}.log`)
}

export function formatLine(level: LogLevel, msg: string, ctx?: LogContext, at: Date = new Date()): string {
  const payload = ctx && Object.keys(ctx).length > 0 ? ` ${JSON.stringify(ctx)}` : ''
  return `${at.toISOString()} [${level}] ${msg}${payload}`
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const minIdx = LOG_LEVELS.indexOf(options.level ?? 'warn')
  const write = options.write ?? ((line: string) => process.stderr.write(line + '\n'))
  const dir = options.dir

  if (dir) mkdirSync(dir, { recursive: true })

  function log(level: LogLevel, msg: string, ctx?: LogContext) {
    if (LOG_LEVELS.indexOf(level) < minIdx) return
    const line = formatLine(level, msg, ctx)
    write(line)
    if (dir) appendFileSync(logPath(dir), line + '\n', 'utf-8')
  }

  return {
    debug: (msg, ctx) => log('debug', msg, ctx),
    info: (msg, ctx) => log('info', msg, ctx),
    warn: (msg, ctx) => log('warn', msg, ctx),
    error: (msg, ctx) => log('error', msg, ctx),
  }
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
}
