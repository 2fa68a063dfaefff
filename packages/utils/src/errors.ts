/**
 * Base error for every package in the workspace.
 *
 * Errors carry a stable string `code` so callers can branch without
 * `instanceof` across package boundaries, and a recovery type that separates
 * failures a caller is expected to handle from programming errors.
 */

export enum ErrorRecoveryType {
  RECOVERABLE = 'recoverable',
  FATAL = 'fatal',
}

export type ErrorMetadata = Record<string, unknown>

export interface BerthErrorOptions<C extends string> {
  code: C
  recoveryType?: ErrorRecoveryType
  metadata?: ErrorMetadata
  cause?: unknown
}

export class BerthError<C extends string = string> extends Error {
  public readonly code: C
  public readonly recoveryType: ErrorRecoveryType
  public readonly metadata?: ErrorMetadata
  public readonly timestamp: number

  constructor(message: string, options: BerthErrorOptions<C>) {
    super(message, { cause: options.cause })
    this.name = this.constructor.name
    this.code = options.code
    this.recoveryType = options.recoveryType ?? ErrorRecoveryType.RECOVERABLE
    this.metadata = options.metadata
    this.timestamp = Date.now()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  get isFatal(): boolean {
    return this.recoveryType === ErrorRecoveryType.FATAL
  }

  /**
   * Serialize error for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      recoveryType: this.recoveryType,
      metadata: this.metadata,
      timestamp: this.timestamp,
      stack: this.stack,
    }
  }
}

export class InvalidAddressError extends BerthError<'INVALID_ADDRESS'> {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, { code: 'INVALID_ADDRESS', metadata })
  }
}

export function isBerthError(error: unknown): error is BerthError {
  return error instanceof BerthError
}

/** Normalize a thrown value; non-errors are wrapped with their string form. */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
