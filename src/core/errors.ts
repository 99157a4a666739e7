/**
 * Status value every engine call returns on success
 */
export const ENGINE_OK = 1

export type FingerprintErrorKind =
  | 'InvalidArgument'
  | 'InvalidState'
  | 'EngineError'
  | 'DecodeError'
  | 'EncodeError'
  | 'LibraryUnavailable'

export interface FingerprintErrorOptions {
  /** Engine call that failed */
  operation?: string
  /** Non-success status returned by the engine */
  status?: number
  /** Underlying error, if any */
  cause?: unknown
}

/**
 * Raised whenever an engine call fails or the caller breaks the session contract
 */
export class FingerprintError extends Error {
  readonly kind: FingerprintErrorKind
  readonly operation?: string
  readonly status?: number

  constructor(kind: FingerprintErrorKind, message: string, options: FingerprintErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = 'FingerprintError'
    this.kind = kind
    this.operation = options.operation
    this.status = options.status
  }
}

/**
 * Convert an engine status into a FingerprintError of the given kind
 */
export function checkStatus(status: number, kind: FingerprintErrorKind, operation: string): void {
  if (status !== ENGINE_OK) {
    throw new FingerprintError(kind, `${operation} failed with status ${status}`, { operation, status })
  }
}

export function isFingerprintError(value: unknown, kind?: FingerprintErrorKind): value is FingerprintError {
  return value instanceof FingerprintError && (kind === undefined || value.kind === kind)
}

/**
 * Call into the engine, reporting anything it throws as a FingerprintError of the given kind
 */
export function guardEngineCall<T>(kind: FingerprintErrorKind, operation: string, call: () => T): T {
  try {
    return call()
  } catch (error) {
    if (isFingerprintError(error)) {
      throw error
    }
    throw new FingerprintError(kind, `${operation} threw`, { operation, cause: error })
  }
}

/**
 * Run `body`, then release engine-owned memory whether it succeeded or not.
 * When `body` fails its error is kept and a failing release is only logged.
 */
export function releaseAfter<T>(kind: FingerprintErrorKind, operation: string, body: () => T, release: () => void): T {
  let result: T
  try {
    result = body()
  } catch (error) {
    try {
      release()
    } catch (releaseError) {
      console.error(`Failed to release ${operation} buffer:`, releaseError)
    }
    throw error
  }

  guardEngineCall(kind, operation, release)
  return result
}
