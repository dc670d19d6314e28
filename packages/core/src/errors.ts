export type RecorderErrorCode = 'E_CONFIG' | 'E_CONNECT' | 'E_ABORTED' | 'E_READ' | 'E_PERSIST'

export class RecorderError extends Error {
  readonly code: RecorderErrorCode

  constructor(code: RecorderErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

/** Invalid run configuration; raised before anything connects. */
export class ConfigurationError extends RecorderError {
  readonly issues: string[]

  constructor(issues: string[], options?: { cause?: unknown }) {
    super('E_CONFIG', `invalid configuration: ${issues.join('; ')}`, options)
    this.issues = issues
  }
}

/** A source could not connect, or the optional connect timeout elapsed. */
export class ConnectionFailure extends RecorderError {
  readonly pvs: string[]

  constructor(pvs: string[], message: string, options?: { cause?: unknown }) {
    super('E_CONNECT', message, options)
    this.pvs = pvs
  }
}

export class ConnectionAbortedError extends RecorderError {
  constructor(message = 'connect wait cancelled') {
    super('E_ABORTED', message)
  }
}

/** A source failed to produce a value; the cycle is skipped. */
export class ReadFailure extends RecorderError {
  readonly pv: string

  constructor(pv: string, message: string, options?: { cause?: unknown }) {
    super('E_READ', message, options)
    this.pv = pv
  }
}

/** Directory creation or append failed; the run stops. */
export class PersistenceFailure extends RecorderError {
  readonly path: string

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super('E_PERSIST', message, options)
    this.path = path
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}
