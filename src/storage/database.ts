/**
 * Hostbook — Inventory Database
 *
 * SQLite-backed inventory table: read query, schema setup and insert.
 * One connection per invocation, passed explicitly and closed on exit.
 */

import Database from 'better-sqlite3'
import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import { toStorageError } from '../errors.js'
import { toInventoryRows } from '../inventory/builder.js'
import type { GroupVarRow, InventoryRow, NewHost } from '../inventory/types.js'
import { decodeVarValue, encodeVarValue } from '../inventory/vars.js'

type Connection = Database.Database

/** Column shape of the `inventory` table as the driver returns it */
type InventoryTableRow = {
  host: string | null
  group_name: string | null
  var_key: string | null
  var_value: string | null
}

type GroupVarsTableRow = {
  group_name: string
  var_key: string
  var_value: string | null
}

export const SCHEMA = `
  CREATE TABLE IF NOT EXISTS inventory (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    host TEXT,
    group_name TEXT,
    var_key TEXT,
    var_value TEXT
  );
  CREATE INDEX IF NOT EXISTS idx_inventory_host ON inventory (host);
  CREATE TABLE IF NOT EXISTS group_vars (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    group_name TEXT NOT NULL,
    var_key TEXT NOT NULL,
    var_value TEXT
  );
`

export type StoreOptions = {
  /** Database file, or `:memory:` */
  path: string
  /** Read commands never create the file */
  readonly?: boolean
  /** Busy timeout for a locked database */
  timeoutMs?: number
}

// ── Store ───────────────────────────────────────────────────────────────────

export class InventoryStore {
  constructor(private readonly db: Connection) {}

  /** Every inventory row in insertion order, which is what last-write-wins follows */
  readRows(): InventoryRow[] {
    const rows = this.query<InventoryTableRow>(
      'SELECT host, group_name, var_key, var_value FROM inventory ORDER BY rowid',
    )
    return rows.map((r) => ({
      host: r.host,
      group: r.group_name,
      key: r.var_key,
      value: decodeVarValue(r.var_value),
    }))
  }

  /** Group variables are optional: a database without the table has none */
  readGroupVars(): GroupVarRow[] {
    if (!this.hasTable('group_vars')) return []
    const rows = this.query<GroupVarsTableRow>(
      'SELECT group_name, var_key, var_value FROM group_vars ORDER BY rowid',
    )
    return rows.map((r) => ({ group: r.group_name, key: r.var_key, value: decodeVarValue(r.var_value) }))
  }

  hostExists(name: string): boolean {
    try {
      return this.db.prepare('SELECT 1 FROM inventory WHERE host = ? LIMIT 1').get(name) !== undefined
    } catch (err) {
      throw toStorageError(err)
    }
  }

  /** Insert every row of a new host in one transaction; returns the row count */
  insertHost(host: NewHost): number {
    const rows = toInventoryRows(host)
    try {
      const insert = this.db.prepare(
        'INSERT INTO inventory (host, group_name, var_key, var_value) VALUES (?, ?, ?, ?)',
      )
      const insertAll = this.db.transaction((batch: InventoryRow[]) => {
        for (const row of batch) {
          insert.run(row.host, row.group, row.key, row.key === null ? null : encodeVarValue(row.value))
        }
      })
      insertAll(rows)
    } catch (err) {
      throw toStorageError(err)
    }
    return rows.length
  }

  close(): void {
    if (this.db.open) this.db.close()
  }

  private hasTable(name: string): boolean {
    try {
      return this.db
        .prepare("SELECT 1 FROM sqlite_master WHERE type IN ('table', 'view') AND name = ?")
        .get(name) !== undefined
    } catch (err) {
      throw toStorageError(err)
    }
  }

  private query<T>(sql: string): T[] {
    try {
      // the column list in `sql` fixes the row shape
      return this.db.prepare<[], T>(sql).all()
    } catch (err) {
      throw toStorageError(err)
    }
  }
}

// ── Connection ──────────────────────────────────────────────────────────────

/** Open a connection; writable connections create the file and schema */
export function openInventoryStore(options: StoreOptions): InventoryStore {
  const inMemory = options.path === ':memory:'
  let db: Connection
  try {
    if (!options.readonly && !inMemory) {
      mkdirSync(dirname(options.path), { recursive: true })
    }
    db = new Database(options.path, {
      readonly: options.readonly === true && !inMemory,
      fileMustExist: options.readonly === true && !inMemory,
      timeout: options.timeoutMs,
    })
  } catch (err) {
    throw toStorageError(err)
  }

  if (!options.readonly || inMemory) {
    try {
      db.exec(SCHEMA)
    } catch (err) {
      db.close()
      throw toStorageError(err)
    }
  }

  return new InventoryStore(db)
}

/** Acquire a store, run `fn`, release it whether `fn` succeeds or throws */
export async function withInventoryStore<T>(
  options: StoreOptions,
  fn: (store: InventoryStore) => T | Promise<T>,
): Promise<T> {
  const store = openInventoryStore(options)
  try {
    return await fn(store)
  } finally {
    store.close()
  }
}
