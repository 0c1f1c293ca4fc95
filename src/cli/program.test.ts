import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import Database from 'better-sqlite3'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { run, type CliIO } from './program.js'

type Captured = { code: number; stdout: string; stderr: string }

describe('inventory CLI', () => {
  let dir: string
  let base: string[]

  async function cli(...args: string[]): Promise<Captured> {
    let stdout = ''
    let stderr = ''
    const io: CliIO = {
      stdout: (text) => { stdout += text },
      stderr: (text) => { stderr += text },
      env: {},
      resolver: async () => '192.0.2.10',
    }
    const code = await run([...base, ...args], io)
    return { code, stdout, stderr }
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'hostbook-cli-'))
    const config = join(dir, 'config.yaml')
    writeFileSync(config, 'reserved_names: [gateway]\n')
    base = ['--config', config, '--db', join(dir, 'inventory.db')]
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('adds a host and prints a confirmation', async () => {
    const result = await cli('add', 'db1.example.com', '-g', 'db,backup', '--var', 'role=primary', '--var', 'port=5432')

    expect(result).toEqual({
      code: 0,
      stdout: '{"added":"db1.example.com","groups":["db","backup"],"vars":{"role":"primary","port":5432},"rows":4}\n',
      stderr: '',
    })
  })

  it('prints the full inventory for --list', async () => {
    await cli('add', 'web1.example.com', '-g', 'web', '--var', 'http_port=8080')
    await cli('add', 'web2.example.com', '--group', 'web', '--group', 'canary')

    const result = await cli('--list')

    expect(result.code).toBe(0)
    expect(JSON.parse(result.stdout)).toEqual({
      canary: { hosts: ['web2.example.com'], vars: {} },
      web: { hosts: ['web1.example.com', 'web2.example.com'], vars: {} },
      _meta: {
        hostvars: {
          'web1.example.com': { http_port: 8080 },
          'web2.example.com': {},
        },
      },
    })
  })

  it('lists a database that only has the inventory table', async () => {
    const db = new Database(join(dir, 'inventory.db'))
    db.exec('CREATE TABLE inventory (host TEXT, group_name TEXT, var_key TEXT, var_value TEXT)')
    db.prepare('INSERT INTO inventory (host, group_name, var_key, var_value) VALUES (?, ?, ?, ?)').run('web1', 'web', null, null)
    db.close()

    expect(await cli('--list')).toEqual({
      code: 0,
      stdout: '{"web":{"hosts":["web1"],"vars":{}},"_meta":{"hostvars":{"web1":{}}}}\n',
      stderr: '',
    })
  })

  it('answers --host, including for unknown hosts', async () => {
    await cli('add', 'web1.example.com', '--var', 'http_port=8080')

    expect((await cli('--host', 'web1.example.com')).stdout).toBe('{"http_port":8080}\n')
    expect((await cli('--host', 'nope.example.com')).stdout).toBe('{}\n')
  })

  it('queries groups and hosts with get', async () => {
    await cli('add', 'web1.example.com', '-g', 'web', '--var', 'http_port=8080')
    await cli('add', 'web2.example.com', '-g', 'web')

    expect((await cli('get', '--group', 'web')).stdout).toBe('["web1.example.com","web2.example.com"]\n')
    expect((await cli('get', '--groups')).stdout).toBe('["web"]\n')
    expect((await cli('get', '--host', 'web1.example.com')).stdout).toBe('{"http_port":8080}\n')
    expect((await cli('get', '--match', 'web2')).stdout).toBe('{"web2.example.com":{}}\n')
  })

  it('fails with a message for an unknown group', async () => {
    await cli('add', 'web1.example.com', '-g', 'web')

    expect(await cli('get', '--group', 'cache')).toEqual({
      code: 1,
      stdout: '',
      stderr: "error: No group matching 'cache'\n",
    })
  })

  it('fails for an unknown host', async () => {
    await cli('add', 'web1.example.com', '-g', 'web')

    const result = await cli('get', '--host', 'mail.example.com')
    expect(result.code).toBe(1)
    expect(result.stderr).toBe("error: No host matching 'mail.example.com'\n")
  })

  it('requires exactly one get selector', async () => {
    const result = await cli('get', '--groups', '--group', 'web')

    expect(result.code).toBe(1)
    expect(result.stderr).toBe('error: get requires exactly one of --group, --groups, --host, --match\n')
  })

  it('rejects invalid hosts', async () => {
    expect(await cli('add', '')).toEqual({ code: 1, stdout: '', stderr: 'error: Host name must not be empty\n' })
    expect((await cli('add', 'gateway')).stderr).toBe("error: Host name 'gateway' is reserved\n")
    expect((await cli('add', 'db1', '--var', 'role')).stderr).toBe("error: Invalid variable 'role', expected key=value\n")
  })

  it('rejects a duplicate host', async () => {
    await cli('add', 'db1.example.com')

    const result = await cli('add', 'db1.example.com')
    expect(result.code).toBe(1)
    expect(result.stderr).toBe("error: Host 'db1.example.com' already exists\n")
  })

  it('stores resolved and explicit addresses', async () => {
    const resolved = await cli('add', 'db1.example.com', '--resolve', '--disabled')
    const explicit = await cli('add', 'db2.example.com', '-i', '10.0.0.7')

    expect(JSON.parse(resolved.stdout).vars).toEqual({ enabled: false, ansible_host: '192.0.2.10' })
    expect(JSON.parse(explicit.stdout).vars).toEqual({ ansible_host: '10.0.0.7' })
  })

  it('reports a storage error when the database is missing', async () => {
    const result = await cli('--list')

    expect(result.code).toBe(1)
    expect(result.stdout).toBe('')
    expect(result.stderr).toMatch(/^error: /)
  })

  it('prints help and fails without a command', async () => {
    const result = await cli()

    expect(result.code).toBe(1)
    expect(result.stderr).toContain('Usage: inventory')
  })
})
