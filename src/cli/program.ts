/**
 * Hostbook — CLI
 *
 * `inventory --list` / `--host` follow the automation tool's dynamic
 * inventory contract; `get` and `add` are for people.
 *
 * Usage:
 *   inventory --list
 *   inventory --host web1.example.com
 *   inventory get --group web
 *   inventory get --groups
 *   inventory get --host web1.example.com
 *   inventory get --match web
 *   inventory add db1.example.com -g db --var role=primary
 *
 * Global options (--db, --config, --verbose) go before the command.
 */

import { Command, CommanderError } from 'commander'
import { loadConfig } from '../config/loader.js'
import { homeDir, logDir } from '../config/paths.js'
import type { HostbookConfig } from '../config/types.js'
import { HostbookError } from '../errors.js'
import { createLogger, type Logger } from '../log/logger.js'
import { withInventoryStore, type InventoryStore } from '../storage/database.js'
import {
  addHost,
  findHosts,
  getGroupHosts,
  getGroupNames,
  getHostVariables,
  hostVarsFor,
  listInventory,
  type Resolver,
} from '../inventory/service.js'
import { parseVarAssignments, splitList } from '../inventory/vars.js'

export type CliIO = {
  stdout: (text: string) => void
  stderr: (text: string) => void
  env?: NodeJS.ProcessEnv
  resolver?: Resolver
}

type GlobalOptions = {
  list?: boolean
  host?: string
  db?: string
  config?: string
  verbose?: boolean
}

type GetOptions = {
  group?: string
  groups?: boolean
  host?: string
  match?: string
}

type AddOptions = {
  group: string[]
  var: string[]
  ipaddr?: string
  resolve?: boolean
  disabled?: boolean
}

type Invocation = {
  config: HostbookConfig
  logger: Logger
}

function collectList(value: string, previous: string[]): string[] {
  return previous.concat(splitList(value))
}

function collect(value: string, previous: string[]): string[] {
  return previous.concat([value])
}

export function createProgram(io: CliIO): Command {
  const program = new Command()

  const print = (value: unknown) => io.stdout(JSON.stringify(value) + '\n')

  function setup(): Invocation {
    const opts = program.opts<GlobalOptions>()
    const config = loadConfig({ path: opts.config, env: io.env })
    if (opts.db) config.database.path = opts.db
    const logger = createLogger({
      level: opts.verbose ? 'debug' : config.log_level,
      dir: config.log ? logDir(homeDir(io.env)) : undefined,
      write: (line) => io.stderr(line + '\n'),
    })
    logger.debug('config loaded', { database: config.database.path })
    return { config, logger }
  }

  function read<T>(inv: Invocation, fn: (store: InventoryStore) => T): Promise<T> {
    return withInventoryStore(
      { path: inv.config.database.path, readonly: true, timeoutMs: inv.config.database.timeout_ms },
      fn,
    )
  }

  program
    .name('inventory')
    .description('Retrieve and insert dynamic inventory hosts')
    .enablePositionalOptions()
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
    })
    .option('-l, --list', 'output entire inventory')
    .option('--host <name>', 'output variables of one host')
    .option('--db <path>', 'inventory database file')
    .option('--config <path>', 'config file')
    .option('-v, --verbose', 'debug logging')
    .action(async (opts: GlobalOptions) => {
      if (opts.list) {
        const inv = setup()
        print(await read(inv, (store) => listInventory(store, inv.logger)))
      } else if (opts.host !== undefined) {
        const inv = setup()
        const host = opts.host
        print(await read(inv, (store) => hostVarsFor(store, host, inv.logger)))
      } else {
        program.help({ error: true })
      }
    })

  program
    .command('get')
    .description('retrieve hosts or groups')
    .option('--group <name>', 'host names of a group')
    .option('--groups', 'all group names')
    .option('--host <name>', 'variables of a host')
    .option('--match <prefix>', 'variables of hosts whose name starts with prefix; `all` matches every host')
    .action(async (opts: GetOptions, command: Command) => {
      const selected = [opts.group !== undefined, opts.groups === true, opts.host !== undefined, opts.match !== undefined]
      if (selected.filter(Boolean).length !== 1) {
        command.error('error: get requires exactly one of --group, --groups, --host, --match')
      }

      const inv = setup()
      const result = await read(inv, (store) => {
        if (opts.group !== undefined) return getGroupHosts(store, opts.group, inv.logger)
        if (opts.host !== undefined) return getHostVariables(store, opts.host, inv.logger)
        if (opts.match !== undefined) return findHosts(store, opts.match, inv.logger)
        return getGroupNames(store, inv.logger)
      })
      print(result)
    })

  program
    .command('add')
    .description('write a new host to the inventory')
    .argument('<name>', 'host name, usually its FQDN')
    .option('-g, --group <group>', 'group to join; repeat or comma-separate for several', collectList, [])
    .option('--var <key=value>', 'host variable; repeat for several', collect, [])
    .option('-i, --ipaddr <address>', 'address stored as ansible_host')
    .option('--resolve', 'look the name up and store its address as ansible_host')
    .option('-d, --disabled', 'add the host with enabled=false')
    .action(async (name: string, opts: AddOptions) => {
      const inv = setup()
      const vars = parseVarAssignments(opts.var)
      const result = await withInventoryStore(
        { path: inv.config.database.path, timeoutMs: inv.config.database.timeout_ms },
        (store) =>
          addHost(
            store,
            { name, groups: opts.group, vars, ipaddr: opts.ipaddr, resolve: opts.resolve, disabled: opts.disabled },
            { logger: inv.logger, reservedNames: inv.config.reserved_names, resolver: io.resolver },
          ),
      )
      print(result)
    })

  return program
}

/** Run one command; resolves to the process exit code */
export async function run(argv: readonly string[], io: CliIO): Promise<number> {
  const program = createProgram(io)
  try {
    await program.parseAsync([...argv], { from: 'user' })
    return 0
  } catch (err) {
    // commander has already printed help or the usage error
    if (err instanceof CommanderError) return err.exitCode
    if (err instanceof HostbookError) {
      io.stderr(`error: ${err.message}\n`)
      return err.exitCode
    }
    io.stderr(`error: ${err instanceof Error ? err.message : String(err)}\n`)
    return 1
  }
}
