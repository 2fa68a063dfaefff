import { BerthError, type ErrorMetadata, ErrorRecoveryType } from '@berth/utils'

export enum PlatformErrorCode {
  INVALID_PARAMETERS = 'INVALID_PARAMETERS',
  UNSUPPORTED_SOCKET_OPTION = 'UNSUPPORTED_SOCKET_OPTION',
  LISTENER_STATE = 'LISTENER_STATE',
}

/**
 * Thrown synchronously by a platform when listener parameters cannot be
 * honoured, e.g. a unix path for a datagram listener.
 */
export class InvalidParametersError extends BerthError<PlatformErrorCode.INVALID_PARAMETERS> {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, { code: PlatformErrorCode.INVALID_PARAMETERS, metadata })
  }
}

export class UnsupportedSocketOptionError extends BerthError<PlatformErrorCode.UNSUPPORTED_SOCKET_OPTION> {
  constructor(level: string, name: string) {
    super(`socket option ${level}/${name} is not supported by this transport`, {
      code: PlatformErrorCode.UNSUPPORTED_SOCKET_OPTION,
      metadata: { level, name },
    })
  }
}

/**
 * Misuse of a platform primitive, such as starting a listener twice.
 */
export class ListenerStateError extends BerthError<PlatformErrorCode.LISTENER_STATE> {
  constructor(message: string) {
    super(message, {
      code: PlatformErrorCode.LISTENER_STATE,
      recoveryType: ErrorRecoveryType.FATAL,
    })
  }
}
