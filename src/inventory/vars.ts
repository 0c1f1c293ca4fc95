/**
 * Hostbook — Variable Parsing
 *
 * `k=v` assignments from the command line, and the JSON text
 * encoding variable values use in the table.
 */

import { parse as parseYaml } from 'yaml'
import { ValidationError } from '../errors.js'
import type { HostVars, VarValue } from './types.js'

const NULL_LITERALS = ['~', 'null', 'Null', 'NULL']

function isVarValue(value: unknown): value is VarValue {
  return value === null || ['string', 'number', 'boolean'].includes(typeof value)
}

/** Read a command-line value the way YAML reads a scalar: `8080` is a number, `true` a boolean */
export function parseScalar(raw: string): VarValue {
  if (raw === '') return ''
  try {
    const parsed: unknown = parseYaml(raw)
    // a bare comment such as `#1` also parses to null
    if (parsed === null && !NULL_LITERALS.includes(raw.trim())) return raw
    return isVarValue(parsed) ? parsed : raw
  } catch {
    // not valid YAML on its own, e.g. `a: b: c`
    return raw
  }
}

/** Split `key=value` on the first `=` */
export function parseVarAssignment(assignment: string): [string, VarValue] {
  const eq = assignment.indexOf('=')
  if (eq === -1) {
    throw new ValidationError(`Invalid variable '${assignment}', expected key=value`)
  }
  const key = assignment.slice(0, eq).trim()
  if (!key) {
    throw new ValidationError(`Invalid variable '${assignment}', key must not be empty`)
  }
  return [key, parseScalar(assignment.slice(eq + 1))]
}

/** Later assignments of the same key win */
export function parseVarAssignments(assignments: readonly string[]): HostVars {
  // fromEntries keeps a key such as `__proto__` as an own property
  const vars = new Map<string, VarValue>()
  for (const assignment of assignments) {
    const [key, value] = parseVarAssignment(assignment)
    vars.set(key, value)
  }
  return Object.fromEntries(vars)
}

/** `"a,b, c"` → `['a', 'b', 'c']` */
export function splitList(value: string): string[] {
  return value.split(',').map((s) => s.trim()).filter(Boolean)
}

// ── Table encoding ──────────────────────────────────────────────────────────

export function encodeVarValue(value: VarValue): string | null {
  return value === null ? null : JSON.stringify(value)
}

/** Values written by hand into the table may not be JSON; those stay plain strings */
export function decodeVarValue(text: string | null): VarValue {
  if (text === null) return null
  try {
    const parsed: unknown = JSON.parse(text)
    return isVarValue(parsed) ? parsed : text
  } catch {
    return text
  }
}
