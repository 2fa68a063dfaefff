import { BerthError, type ErrorMetadata, ErrorRecoveryType } from '@berth/utils'

export enum ChannelErrorCode {
  IO_ON_CLOSED_CHANNEL = 'IO_ON_CLOSED_CHANNEL',
  OPERATION_UNSUPPORTED = 'OPERATION_UNSUPPORTED',
  NOT_PRE_CONFIGURED = 'NOT_PRE_CONFIGURED',
  UNABLE_TO_RESOLVE_ENDPOINT = 'UNABLE_TO_RESOLVE_ENDPOINT',
  PLATFORM_FAILURE = 'PLATFORM_FAILURE',
  INAPPROPRIATE_OPERATION_FOR_STATE = 'INAPPROPRIATE_OPERATION_FOR_STATE',
  END_OF_STREAM = 'END_OF_STREAM',
  INVARIANT_VIOLATION = 'INVARIANT_VIOLATION',
  UNSUPPORTED_CHANNEL_OPTION = 'UNSUPPORTED_CHANNEL_OPTION',
  PROMISE_ALREADY_COMPLETED = 'PROMISE_ALREADY_COMPLETED',
  EVENT_LOOP_SHUTDOWN = 'EVENT_LOOP_SHUTDOWN',
}

export class ChannelError<
  C extends ChannelErrorCode = ChannelErrorCode,
> extends BerthError<C> {}

/** Any operation attempted once the channel has closed. */
export class IOOnClosedChannelError extends ChannelError<ChannelErrorCode.IO_ON_CLOSED_CHANNEL> {
  constructor() {
    super('operation attempted on a closed channel', {
      code: ChannelErrorCode.IO_ON_CLOSED_CHANNEL,
    })
  }
}

export class OperationUnsupportedError extends ChannelError<ChannelErrorCode.OPERATION_UNSUPPORTED> {
  constructor(operation: string) {
    super(`operation not supported: ${operation}`, {
      code: ChannelErrorCode.OPERATION_UNSUPPORTED,
      metadata: { operation },
    })
  }
}

export class NotPreConfiguredError extends ChannelError<ChannelErrorCode.NOT_PRE_CONFIGURED> {
  constructor(metadata?: ErrorMetadata) {
    super('listener is not in its initial setup state', {
      code: ChannelErrorCode.NOT_PRE_CONFIGURED,
      metadata,
    })
  }
}

export class UnableToResolveEndpointError extends ChannelError<ChannelErrorCode.UNABLE_TO_RESOLVE_ENDPOINT> {
  constructor(reason: string) {
    super(`unable to resolve local endpoint: ${reason}`, {
      code: ChannelErrorCode.UNABLE_TO_RESOLVE_ENDPOINT,
    })
  }
}

/** The platform primitive reported `failed`; the platform error is the cause. */
export class PlatformFailureError extends ChannelError<ChannelErrorCode.PLATFORM_FAILURE> {
  constructor(cause: Error) {
    super(`platform failure: ${cause.message}`, {
      code: ChannelErrorCode.PLATFORM_FAILURE,
      cause,
    })
  }
}

export class InappropriateOperationForStateError extends ChannelError<ChannelErrorCode.INAPPROPRIATE_OPERATION_FOR_STATE> {
  constructor(operation: string, state: string) {
    super(`cannot ${operation} while ${state}`, {
      code: ChannelErrorCode.INAPPROPRIATE_OPERATION_FOR_STATE,
      metadata: { operation, state },
    })
  }
}

export class EndOfStreamError extends ChannelError<ChannelErrorCode.END_OF_STREAM> {
  constructor() {
    super('remote peer closed the stream', {
      code: ChannelErrorCode.END_OF_STREAM,
    })
  }
}

export class InvariantViolationError extends ChannelError<ChannelErrorCode.INVARIANT_VIOLATION> {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, {
      code: ChannelErrorCode.INVARIANT_VIOLATION,
      recoveryType: ErrorRecoveryType.FATAL,
      metadata,
    })
  }
}

/** The option set is closed; asking for anything else is a programming error. */
export class UnsupportedChannelOptionError extends ChannelError<ChannelErrorCode.UNSUPPORTED_CHANNEL_OPTION> {
  constructor(option: string, channel: string) {
    super(`option ${option} is not supported by ${channel}`, {
      code: ChannelErrorCode.UNSUPPORTED_CHANNEL_OPTION,
      recoveryType: ErrorRecoveryType.FATAL,
      metadata: { option, channel },
    })
  }
}

export class PromiseAlreadyCompletedError extends ChannelError<ChannelErrorCode.PROMISE_ALREADY_COMPLETED> {
  constructor() {
    super('promise completed more than once', {
      code: ChannelErrorCode.PROMISE_ALREADY_COMPLETED,
      recoveryType: ErrorRecoveryType.FATAL,
    })
  }
}

export class EventLoopShutdownError extends ChannelError<ChannelErrorCode.EVENT_LOOP_SHUTDOWN> {
  constructor(label: string) {
    super(`event loop ${label} is shutting down`, {
      code: ChannelErrorCode.EVENT_LOOP_SHUTDOWN,
      recoveryType: ErrorRecoveryType.FATAL,
      metadata: { label },
    })
  }
}

export function isChannelError<C extends ChannelErrorCode>(
  error: unknown,
  code: C,
): error is ChannelError<C> {
  return error instanceof ChannelError && error.code === code
}
