// src/utils/errors.ts

export type DepsumErrorCode =
  | 'CONFIG'
  | 'USAGE'
  | 'PATTERN'
  | 'FILESYSTEM'
  | 'RESOLVE'

export class DepsumError extends Error {
  readonly code: DepsumErrorCode

  constructor(code: DepsumErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

/** Malformed, unreadable or structurally invalid config file. */
export class ConfigError extends DepsumError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG', message, options)
  }
}

/** Bad or conflicting command line options. */
export class UsageError extends DepsumError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('USAGE', message, options)
  }
}

/** A glob or regular expression that cannot be used. */
export class PatternError extends DepsumError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PATTERN', message, options)
  }
}

export class FileSystemError extends DepsumError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('FILESYSTEM', message, options)
  }
}

/** Python module or identifier that cannot be turned into files. */
export class ResolveError extends DepsumError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('RESOLVE', message, options)
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Prefix `error` with `context`, keeping its code. Errors that did not come
 * from depsum (fs, globbing) are treated as filesystem failures.
 */
export function withContext(context: string, error: unknown): DepsumError {
  const message = `${context}: ${errorMessage(error)}`
  if (error instanceof DepsumError) {
    return new DepsumError(error.code, message, { cause: error })
  }
  return new FileSystemError(message, { cause: error })
}
