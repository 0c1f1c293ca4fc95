import { describe, it, expect, afterEach } from 'vitest'
import { mkdtempSync, readFileSync, readdirSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { createLogger, formatLine } from './logger.js'

describe('formatLine', () => {
  const at = new Date('2024-05-01T12:00:00.000Z')

  it('appends the context as JSON', () => {
    expect(formatLine('warn', 'skipping row', { index: 3 }, at)).toBe(
      '2024-05-01T12:00:00.000Z [warn] skipping row {"index":3}',
    )
  })

  it('omits an empty context', () => {
    expect(formatLine('info', 'done', {}, at)).toBe('2024-05-01T12:00:00.000Z [info] done')
  })
})

describe('createLogger', () => {
  let dir: string | undefined

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true })
    dir = undefined
  })

  it('drops lines below the level', () => {
    const lines: string[] = []
    const logger = createLogger({ level: 'warn', write: (line) => lines.push(line) })

    logger.debug('one')
    logger.info('two')
    logger.warn('three')
    logger.error('four')

    expect(lines.map((l) => l.replace(/^\S+ /, ''))).toEqual(['[warn] three', '[error] four'])
  })

  it('appends to a dated file when given a directory', () => {
    dir = mkdtempSync(join(tmpdir(), 'hostbook-log-'))
    const logger = createLogger({ level: 'info', dir, write: () => {} })

    logger.info('host added', { host: 'db1' })

    const files = readdirSync(dir)
    expect(files).toHaveLength(1)
    expect(files[0]).toMatch(/^hostbook-\d{4}-\d{2}-\d{2}\.log$/)
    expect(readFileSync(join(dir, files[0]), 'utf-8')).toMatch(/\[info\] host added \{"host":"db1"\}\n$/)
  })
})
