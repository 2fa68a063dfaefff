import {
  applyProtocolSocketOption,
  type ConnectionState,
  type PlatformConnection,
  type ProtocolOptions,
  protocolSocketOptionValue,
} from '@berth/platform'
import { toError } from '@berth/utils'
import debug from 'debug'
import type { Channel, OutboundUserEvent } from './channel'
import {
  EndOfStreamError,
  InappropriateOperationForStateError,
  InvariantViolationError,
  IOOnClosedChannelError,
  OperationUnsupportedError,
  PlatformFailureError,
  UnsupportedChannelOptionError,
} from './errors'
import type { EventLoop } from './event-loop'
import type { ChannelPromise } from './future'
import {
  type ChannelOption,
  type ChannelOptionKind,
  ChannelOptions,
  SocketOptionValueSchema,
} from './options'
import { StateManagedChannel } from './state-managed-channel'

const log = debug('berth:channel:connection')

/** Runs once per accepted child before it is activated. */
export type ChildChannelInitializer = (
  channel: ConnectionChannel,
) => PromiseLike<void> | void

export interface ConnectionChannelInit {
  parent: Channel
  eventLoop: EventLoop
  connection: PlatformConnection
  /** Owned by this channel; callers pass a copy. */
  protocolOptions: ProtocolOptions
  initializer?: ChildChannelInitializer
  label?: string
}

export type ConnectionActiveState = 'open'

/**
 * A channel around one accepted platform connection. Registered by its
 * listener onto its own loop; after that the listener keeps no reference.
 */
export class ConnectionChannel extends StateManagedChannel<ConnectionActiveState> {
  public readonly parent: Channel
  public readonly connection: PlatformConnection
  public readonly protocolOptions: ProtocolOptions
  private readonly initializer?: ChildChannelInitializer

  constructor(init: ConnectionChannelInit) {
    super(init.eventLoop, init.label ?? 'berth.connection')
    this.parent = init.parent
    this.connection = init.connection
    this.protocolOptions = init.protocolOptions
    this.initializer = init.initializer
  }

  get isWritable(): boolean {
    return this.isActive
  }

  /**
   * Run the initializer, then start the platform connection. `promise`
   * succeeds once the connection reports ready.
   */
  registerAlreadyConfigured0(promise: ChannelPromise<void>): void {
    this.eventLoop.preconditionInEventLoop()

    const state = this.lifecycle.state
    if (state.type !== 'idle') {
      promise.fail(
        state.type === 'closed'
          ? new IOOnClosedChannelError()
          : new InappropriateOperationForStateError('register', state.type),
      )
      return
    }

    const initializer = this.initializer
    if (initializer === undefined) {
      this.alreadyConfigured0(promise)
      return
    }

    void Promise.resolve()
      .then(() => initializer(this))
      .then(
        () => this.reenterLoop(() => this.alreadyConfigured0(promise)),
        (error: unknown) =>
          this.reenterLoop(() => promise.fail(toError(error))),
      )
  }

  /** After the initializer; a loop that has shut down drops the connection. */
  private reenterLoop(task: () => void): void {
    try {
      this.eventLoop.execute(task)
    } catch (error) {
      log('%s cannot return to its loop: %s', this.label, toError(error).message)
      this.connection.cancel()
    }
  }

  private alreadyConfigured0(promise: ChannelPromise<void>): void {
    try {
      this.lifecycle.beginActivating(promise)
    } catch (error) {
      promise.fail(toError(error))
      return
    }

    const connection = this.connection
    connection.stateUpdateHandler = (state) =>
      this.eventLoop.execute(() => this.stateUpdate0(state))
    connection.receiveHandler = (data) =>
      this.eventLoop.execute(() => {
        if (this.isActive) this.pipeline.fireChannelRead(data)
      })
    connection.endOfStreamHandler = () =>
      this.eventLoop.execute(() => this.close0(new EndOfStreamError()))

    try {
      connection.applyProtocolOptions(this.protocolOptions)
      connection.start(this.connectionQueue)
    } catch (error) {
      this.close0(toError(error))
    }
  }

  private stateUpdate0(state: ConnectionState): void {
    switch (state.type) {
      case 'setup':
        throw new InvariantViolationError(
          'connection reported its setup state',
          { channel: this.label },
        )
      case 'preparing':
        return
      case 'waiting':
        log('%s waiting: %s', this.label, state.error.message)
        return
      case 'ready':
        this.connectionReady0()
        return
      case 'failed':
        this.close0(new PlatformFailureError(state.error))
        return
      case 'cancelled':
        // a peer-initiated teardown arrives here without a local close
        if (!this.closed) this.close0(new IOOnClosedChannelError())
        return
    }
  }

  private connectionReady0(): void {
    if (this.closed) {
      log('%s ignoring ready after close', this.label)
      return
    }
    this.addressCache.store({
      local: this.connection.localAddress,
      remote: this.connection.remoteAddress,
    })
    this.becomeActive0('open')
  }

  protected supportsOption(kind: ChannelOptionKind): boolean {
    return kind === 'autoRead' || kind === 'socket'
  }

  protected writeOption0<V>(option: ChannelOption<V>, value: V): void {
    switch (option.kind) {
      case 'autoRead':
        if (!ChannelOptions.autoRead.schema.parse(value)) {
          throw new OperationUnsupportedError('disable autoRead')
        }
        return
      case 'socket': {
        const key = option.socket
        if (key === undefined) {
          throw new InvariantViolationError('socket option without a key')
        }
        applyProtocolSocketOption(
          this.protocolOptions,
          key,
          SocketOptionValueSchema.parse(value),
        )
        if (this.isActive) {
          this.connection.applyProtocolOptions(this.protocolOptions)
        }
        return
      }
      default:
        throw new UnsupportedChannelOptionError(option.name, this.label)
    }
  }

  protected readOption0<V>(option: ChannelOption<V>): unknown {
    switch (option.kind) {
      case 'autoRead':
        return true
      case 'socket': {
        const key = option.socket
        if (key === undefined) {
          throw new InvariantViolationError('socket option without a key')
        }
        return protocolSocketOptionValue(this.protocolOptions, key)
      }
      default:
        throw new UnsupportedChannelOptionError(option.name, this.label)
    }
  }

  protected write0(data: Uint8Array, promise: ChannelPromise<void>): void {
    const state = this.lifecycle.state
    if (state.type === 'closed') {
      promise.fail(new IOOnClosedChannelError())
      return
    }
    if (state.type !== 'active') {
      promise.fail(new InappropriateOperationForStateError('write', state.type))
      return
    }
    this.connection.send(data, (error) =>
      this.eventLoop.execute(() => {
        if (error) {
          promise.fail(error)
        } else {
          promise.succeed()
        }
      }),
    )
  }

  protected flush0(): void {}

  // autoRead is always on; the platform pushes data as it arrives
  protected read0(): void {}

  protected triggerUserOutboundEvent0(
    event: OutboundUserEvent,
    promise: ChannelPromise<void>,
  ): void {
    promise.fail(
      this.closed
        ? new IOOnClosedChannelError()
        : new OperationUnsupportedError(`outbound event ${event.type}`),
    )
  }

  protected doClose0(error: Error): void {
    log('%s closed: %s', this.label, error.message)
    this.connection.cancel()
  }
}
