/**
 * Hostbook — Errors
 *
 * Every failure that ends an invocation is one of these.
 * The CLI prints the message and exits with `exitCode`.
 */

export type HostbookErrorCode =
  | 'NOT_FOUND'   // query target absent
  | 'VALIDATION'  // bad input to add
  | 'STORAGE'     // connection or query failure
  | 'CONFIG'      // unreadable or malformed config file

export class HostbookError extends Error {
  readonly exitCode: number = 1

  constructor(
    readonly code: HostbookErrorCode,
    message: string,
    readonly context?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'HostbookError'
  }
}

export class NotFoundError extends HostbookError {
  constructor(message: string, context?: Record<string, unknown>) {
    super('NOT_FOUND', message, context)
    this.name = 'NotFoundError'
  }
}

export class ValidationError extends HostbookError {
  constructor(message: string, context?: Record<string, unknown>) {
    super('VALIDATION', message, context)
    this.name = 'ValidationError'
  }
}

export class StorageError extends HostbookError {
  constructor(message: string, context?: Record<string, unknown>) {
    super('STORAGE', message, context)
    this.name = 'StorageError'
  }
}

export class ConfigError extends HostbookError {
  constructor(message: string, context?: Record<string, unknown>) {
    super('CONFIG', message, context)
    this.name = 'ConfigError'
  }
}

/** Wrap a driver error, keeping its message verbatim */
export function toStorageError(err: unknown): StorageError {
  if (err instanceof StorageError) return err
  if (err instanceof Error) {
    const code = 'code' in err ? err.code : undefined
    return new StorageError(err.message, typeof code === 'string' ? { driverCode: code } : undefined)
  }
  return new StorageError(String(err))
}
