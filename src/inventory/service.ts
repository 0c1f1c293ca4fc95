/**
 * Hostbook — Inventory Service
 *
 * One function per command. Each reads from (or writes to) the store it
 * is handed and leaves the reshaping to the builder.
 */

import { lookup } from 'node:dns/promises'
import { isIP } from 'node:net'
import { ValidationError } from '../errors.js'
import type { Logger } from '../log/logger.js'
import type { InventoryStore } from '../storage/database.js'
import {
  DEFAULT_RESERVED_NAMES,
  buildFullInventory,
  getGroup,
  getHostVars,
  listGroups,
  matchHostVars,
  validateNewHost,
} from './builder.js'
import type { HostVars, InventoryDocument } from './types.js'

/** Resolves a host name to an address */
export type Resolver = (hostname: string) => Promise<string>

export const dnsResolver: Resolver = async (hostname) => (await lookup(hostname)).address

export type AddHostRequest = {
  name: string
  groups: string[]
  vars: HostVars
  ipaddr?: string
  resolve?: boolean
  disabled?: boolean
}

export type AddHostOptions = {
  logger: Logger
  reservedNames?: readonly string[]
  resolver?: Resolver
}

export type AddResult = {
  added: string
  groups: string[]
  vars: HostVars
  rows: number
}

// ── Reads ───────────────────────────────────────────────────────────────────

export function listInventory(store: InventoryStore, logger: Logger): InventoryDocument {
  const rows = store.readRows()
  logger.debug('read inventory rows', { rows: rows.length })
  return buildFullInventory(rows, store.readGroupVars(), logger)
}

/** `--host` for the automation tool: an unknown host has no variables rather than an error */
export function hostVarsFor(store: InventoryStore, name: string, logger: Logger): HostVars {
  const { hostvars } = listInventory(store, logger)._meta
  return Object.hasOwn(hostvars, name) ? hostvars[name] : {}
}

export function getGroupHosts(store: InventoryStore, name: string, logger: Logger): string[] {
  return getGroup(store.readRows(), name, logger)
}

export function getGroupNames(store: InventoryStore, logger: Logger): string[] {
  return listGroups(store.readRows(), logger)
}

export function getHostVariables(store: InventoryStore, name: string, logger: Logger): HostVars {
  return getHostVars(store.readRows(), name, logger)
}

export function findHosts(store: InventoryStore, prefix: string, logger: Logger): Record<string, HostVars> {
  return matchHostVars(store.readRows(), prefix, logger)
}

// ── Writes ──────────────────────────────────────────────────────────────────

async function hostAddress(request: AddHostRequest, resolver: Resolver): Promise<string | undefined> {
  if (request.ipaddr !== undefined) {
    if (isIP(request.ipaddr) === 0) {
      throw new ValidationError(`'${request.ipaddr}' is not an IP address`, { host: request.name })
    }
    return request.ipaddr
  }
  if (!request.resolve) return undefined

  try {
    return await resolver(request.name)
  } catch (err) {
    throw new ValidationError(
      `Cannot resolve '${request.name}': ${err instanceof Error ? err.message : String(err)}`,
      { host: request.name },
    )
  }
}

export async function addHost(store: InventoryStore, request: AddHostRequest, options: AddHostOptions): Promise<AddResult> {
  const { logger } = options
  const reserved = [...DEFAULT_RESERVED_NAMES, ...(options.reservedNames ?? [])]

  const vars: HostVars = { ...request.vars }
  if (request.disabled) vars.enabled = false

  // names that fail validation are never looked up
  let host = validateNewHost(request.name, request.groups, vars, reserved)
  if (store.hostExists(host.name)) {
    throw new ValidationError(`Host '${host.name}' already exists`, { host: host.name })
  }

  const address = await hostAddress({ ...request, name: host.name }, options.resolver ?? dnsResolver)
  if (address !== undefined) {
    logger.debug('host address', { host: host.name, address })
    host = { ...host, vars: { ...host.vars, ansible_host: address } }
  }

  const rows = store.insertHost(host)
  logger.info('host added', { host: host.name, rows })
  return { added: host.name, groups: host.groups, vars: host.vars, rows }
}
