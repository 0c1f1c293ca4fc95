/**
 * Hostbook — Inventory Builder
 *
 * Reshapes flat table rows into the inventory document and answers
 * subset queries over them. Everything here is pure: rows in, values out.
 */

import { NotFoundError, ValidationError } from '../errors.js'
import { silentLogger, type Logger } from '../log/logger.js'
import type { GroupEntry, GroupVarRow, HostVars, InventoryDocument, InventoryRow, NewHost, VarValue } from './types.js'

/** Names the automation tool gives meaning to; never valid for a new host */
export const DEFAULT_RESERVED_NAMES: readonly string[] = ['all', 'ungrouped', '_meta', 'localhost']

/** Group names a new host may not join */
const RESERVED_GROUPS: readonly string[] = ['all', '_meta']

type ValidRow = InventoryRow & { host: string }

// ── Row hygiene ─────────────────────────────────────────────────────────────

/** Drop rows without a host name, warning once per dropped row */
function validRows(rows: readonly InventoryRow[], logger: Logger): ValidRow[] {
  const valid: ValidRow[] = []
  rows.forEach((row, index) => {
    const host = row.host?.trim()
    if (!host) {
      logger.warn('skipping inventory row without a host name', { index, group: row.group, key: row.key })
      return
    }
    valid.push({ ...row, host })
  })
  return valid
}

function addUnique(list: string[], seen: Set<string>, value: string): void {
  if (seen.has(value)) return
  seen.add(value)
  list.push(value)
}

// ── Document ────────────────────────────────────────────────────────────────
//
// Names come from the table, so they are collected in Maps and turned into
// objects with Object.fromEntries, which defines `__proto__` or `constructor`
// as ordinary own keys.

/** Build the full inventory document from every row in the table */
export function buildFullInventory(
  rows: readonly InventoryRow[],
  groupVars: readonly GroupVarRow[] = [],
  logger: Logger = silentLogger,
): InventoryDocument {
  const hostvars = new Map<string, Map<string, VarValue>>()
  const members = new Map<string, Set<string>>()
  const vars = new Map<string, Map<string, VarValue>>()

  for (const row of validRows(rows, logger)) {
    // rows are in storage read order, so a later key overwrites an earlier one
    const hv = hostvars.get(row.host) ?? new Map<string, VarValue>()
    if (row.key) hv.set(row.key, row.value)
    hostvars.set(row.host, hv)

    if (row.group) {
      const set = members.get(row.group) ?? new Set<string>()
      set.add(row.host)
      members.set(row.group, set)
    }
  }

  for (const gv of groupVars) {
    const gvars = vars.get(gv.group) ?? new Map<string, VarValue>()
    gvars.set(gv.key, gv.value)
    vars.set(gv.group, gvars)
  }

  const groups: [string, GroupEntry][] = []
  const groupNames = [...new Set([...members.keys(), ...vars.keys()])].sort()
  for (const name of groupNames) {
    // `_meta` is the document's own key
    if (name === '_meta') {
      logger.warn('ignoring group named _meta')
      continue
    }
    groups.push([name, {
      hosts: [...(members.get(name) ?? [])].sort(),
      vars: Object.fromEntries(vars.get(name) ?? new Map<string, VarValue>()),
    }])
  }

  return {
    ...Object.fromEntries(groups),
    _meta: { hostvars: toHostvars(hostvars) },
  }
}

function toHostvars(hostvars: Map<string, Map<string, VarValue>>): Record<string, HostVars> {
  return Object.fromEntries([...hostvars].map(([host, hv]) => [host, Object.fromEntries(hv)]))
}

// ── Queries ─────────────────────────────────────────────────────────────────

/** Host names belonging to a group, deduplicated and sorted */
export function getGroup(rows: readonly InventoryRow[], groupName: string, logger: Logger = silentLogger): string[] {
  const hosts = new Set<string>()
  for (const row of validRows(rows, logger)) {
    if (row.group === groupName) hosts.add(row.host)
  }
  if (hosts.size === 0) {
    throw new NotFoundError(`No group matching '${groupName}'`, { group: groupName })
  }
  return [...hosts].sort()
}

/** Distinct group names, sorted */
export function listGroups(rows: readonly InventoryRow[], logger: Logger = silentLogger): string[] {
  const groups = new Set<string>()
  for (const row of validRows(rows, logger)) {
    if (row.group) groups.add(row.group)
  }
  return [...groups].sort()
}

/**
 * Variables of a single host, last write wins.
 * A host present only through membership rows has `{}`; a host no row names is not found.
 */
export function getHostVars(rows: readonly InventoryRow[], hostName: string, logger: Logger = silentLogger): HostVars {
  let found = false
  const hv = new Map<string, VarValue>()
  for (const row of validRows(rows, logger)) {
    if (row.host !== hostName) continue
    found = true
    if (row.key) hv.set(row.key, row.value)
  }
  if (!found) {
    throw new NotFoundError(`No host matching '${hostName}'`, { host: hostName })
  }
  return Object.fromEntries(hv)
}

/** Hostvars of every host whose name starts with `prefix`; `all` matches every host */
export function matchHostVars(
  rows: readonly InventoryRow[],
  prefix: string,
  logger: Logger = silentLogger,
): Record<string, HostVars> {
  const { _meta } = buildFullInventory(rows, [], logger)
  if (prefix === 'all') return _meta.hostvars

  return Object.fromEntries(
    Object.entries(_meta.hostvars)
      .filter(([name]) => name.startsWith(prefix))
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
  )
}

// ── New hosts ───────────────────────────────────────────────────────────────

/** Check a new-host request and normalize it into a record ready for insertion */
export function validateNewHost(
  name: string,
  groups: readonly string[],
  vars: HostVars,
  reserved: readonly string[] = DEFAULT_RESERVED_NAMES,
): NewHost {
  const hostName = name.trim()
  if (!hostName) {
    throw new ValidationError('Host name must not be empty')
  }
  if (/\s/.test(hostName)) {
    throw new ValidationError(`Host name '${hostName}' must not contain whitespace`, { host: hostName })
  }
  if (reserved.includes(hostName)) {
    throw new ValidationError(`Host name '${hostName}' is reserved`, { host: hostName })
  }

  const seen = new Set<string>()
  const groupNames: string[] = []
  for (const raw of groups) {
    const group = raw.trim()
    if (!group) {
      throw new ValidationError('Group name must not be empty', { host: hostName })
    }
    if (RESERVED_GROUPS.includes(group)) {
      throw new ValidationError(`Group name '${group}' is reserved`, { host: hostName, group })
    }
    addUnique(groupNames, seen, group)
  }

  for (const key of Object.keys(vars)) {
    if (!key.trim()) {
      throw new ValidationError('Variable name must not be empty', { host: hostName })
    }
  }

  return { name: hostName, groups: groupNames, vars: { ...vars } }
}

/** Table rows that represent a new host */
export function toInventoryRows(host: NewHost): InventoryRow[] {
  const rows: InventoryRow[] = [
    ...host.groups.map((group) => ({ host: host.name, group, key: null, value: null })),
    ...Object.entries(host.vars).map(([key, value]) => ({ host: host.name, group: null, key, value })),
  ]
  if (rows.length === 0) {
    rows.push({ host: host.name, group: null, key: null, value: null })
  }
  return rows
}
