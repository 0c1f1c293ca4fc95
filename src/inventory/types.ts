/**
 * Hostbook — Inventory Types
 *
 * Rows as read from the table, and the document shape the
 * automation tool expects from a dynamic inventory.
 */

export type VarValue = string | number | boolean | null

export type HostVars = Record<string, VarValue>

/**
 * One row of the `inventory` table.
 * `group` set → membership row, `key` set → variable row,
 * neither → the row only registers the host.
 */
export type InventoryRow = {
  host: string | null
  group: string | null
  key: string | null
  value: VarValue
}

/** One row of the `group_vars` table */
export type GroupVarRow = {
  group: string
  key: string
  value: VarValue
}

export type GroupEntry = {
  hosts: string[]
  vars: HostVars
}

export type InventoryMeta = {
  hostvars: Record<string, HostVars>
}

export type InventoryDocument = {
  _meta: InventoryMeta
  [group: string]: GroupEntry | InventoryMeta
}

/** A validated host, ready to be written */
export type NewHost = {
  name: string
  groups: string[]
  vars: HostVars
}

export function isGroupEntry(value: GroupEntry | InventoryMeta): value is GroupEntry {
  return 'hosts' in value
}
