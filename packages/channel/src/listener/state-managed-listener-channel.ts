import {
  applyProtocolSocketOption,
  createListenerParameters,
  type Endpoint,
  endpointToSocketAddress,
  isSameSocketOption,
  type ListenerPlatform,
  type ListenerState,
  MultipathServiceType,
  type ParametersConfigurator,
  type PlatformConnection,
  type PlatformListener,
  type ProtocolOptions,
  protocolSocketOptionValue,
  SocketOptionKeys,
} from '@berth/platform'
import { type SocketAddress, toError, withPort } from '@berth/utils'
import debug from 'debug'
import type { Channel, OutboundUserEvent } from '../channel'
import type {
  ChildChannelInitializer,
  ConnectionChannel,
} from '../connection-channel'
import {
  InappropriateOperationForStateError,
  InvariantViolationError,
  IOOnClosedChannelError,
  NotPreConfiguredError,
  OperationUnsupportedError,
  PlatformFailureError,
  UnableToResolveEndpointError,
  UnsupportedChannelOptionError,
} from '../errors'
import type { EventLoop } from '../event-loop'
import type { EventLoopGroup } from '../event-loop-group'
import { type ChannelFuture, type ChannelPromise, resultOf } from '../future'
import {
  type ChannelOption,
  type ChannelOptionKind,
  ChannelOptions,
  SocketOptionValueSchema,
} from '../options'
import {
  type OptionAccess,
  StateManagedChannel,
} from '../state-managed-channel'

const log = debug('berth:channel:listener')

export type ListenerActiveState = 'listening'

export interface ListenerChannelInit {
  eventLoop: EventLoop
  childLoopGroup: EventLoopGroup
  platform: ListenerPlatform
  protocolOptions: ProtocolOptions
  childProtocolOptions: ProtocolOptions
  childChannelInitializer?: ChildChannelInitializer
  parametersConfigurator?: ParametersConfigurator
  /** A listener built elsewhere and not yet started, for `adoptPreconfigured`. */
  listener?: PlatformListener
  label?: string
}

/**
 * A channel over a platform listening primitive.
 *
 * Activation builds the platform parameters from the channel options and
 * starts the listener on `connectionQueue`. Every state or accept
 * notification from the platform is re-dispatched onto the owning loop
 * before it touches the channel.
 */
export abstract class StateManagedListenerChannel extends StateManagedChannel<ListenerActiveState> {
  public readonly parent: Channel | undefined = undefined

  protected readonly platform: ListenerPlatform
  protected readonly protocolOptions: ProtocolOptions
  protected readonly childProtocolOptions: ProtocolOptions
  protected readonly childLoopGroup: EventLoopGroup
  protected readonly childChannelInitializer?: ChildChannelInitializer
  protected readonly parametersConfigurator?: ParametersConfigurator

  protected platformListener: PlatformListener | undefined

  protected reuseAddress = false
  protected reusePort = false
  protected allowLocalEndpointReuse = false
  protected enablePeerToPeer = false
  protected multipathServiceType = MultipathServiceType.Disabled

  constructor(init: ListenerChannelInit) {
    super(init.eventLoop, init.label ?? 'berth.listener')
    this.platform = init.platform
    this.protocolOptions = init.protocolOptions
    this.childProtocolOptions = init.childProtocolOptions
    this.childLoopGroup = init.childLoopGroup
    this.childChannelInitializer = init.childChannelInitializer
    this.parametersConfigurator = init.parametersConfigurator
    this.platformListener = init.listener
  }

  /** Listeners never buffer outbound data. */
  get isWritable(): boolean {
    return true
  }

  override get remoteAddress(): SocketAddress | undefined {
    return undefined
  }

  /** Bind to `target` and start listening. */
  activate(target: Endpoint): ChannelFuture<void> {
    const promise = this.eventLoop.makePromise<void>()
    this.runOnLoop(() => this.bind0(target, promise))
    return promise.futureResult
  }

  /** Start the listener this channel was constructed around. */
  adoptPreconfigured(): ChannelFuture<void> {
    const promise = this.eventLoop.makePromise<void>()
    this.runOnLoop(() => this.registerAlreadyConfigured0(promise))
    return promise.futureResult
  }

  bind0(target: Endpoint, promise?: ChannelPromise<void>): void {
    this.eventLoop.preconditionInEventLoop()

    if (
      this.lifecycle.state.type === 'idle' &&
      this.platformListener !== undefined
    ) {
      promise?.fail(
        new InappropriateOperationForStateError('bind', 'preconfigured'),
      )
      return
    }

    try {
      this.lifecycle.beginActivating(promise)
    } catch (error) {
      promise?.fail(toError(error))
      return
    }
    this.beginActivating0(target)
  }

  registerAlreadyConfigured0(promise?: ChannelPromise<void>): void {
    this.eventLoop.preconditionInEventLoop()

    if (this.closed) {
      promise?.fail(new IOOnClosedChannelError())
      return
    }

    const listener = this.platformListener
    if (listener === undefined || listener.state.type !== 'setup') {
      promise?.fail(
        new NotPreConfiguredError({ state: listener?.state.type ?? 'absent' }),
      )
      return
    }

    try {
      this.lifecycle.beginActivating(promise)
    } catch (error) {
      promise?.fail(toError(error))
      return
    }
    this.startListener0(listener)
  }

  protected beginActivating0(target: Endpoint): void {
    const parameters = createListenerParameters(this.protocolOptions)

    switch (target.type) {
      case 'hostPort':
      case 'unix':
        parameters.requiredLocalEndpoint = target
        break
      case 'service':
        parameters.requiredInterface = target.interface
        break
    }

    // the platform has a single reuse switch for both socket options
    parameters.allowLocalEndpointReuse =
      this.reuseAddress || this.reusePort || this.allowLocalEndpointReuse
    parameters.includePeerToPeer = this.enablePeerToPeer
    parameters.multipathServiceType = this.multipathServiceType

    let listener: PlatformListener
    try {
      this.parametersConfigurator?.(parameters)
      listener = this.platform.createListener(parameters)
    } catch (error) {
      log('%s failed to create listener: %o', this.label, error)
      this.close0(toError(error))
      return
    }

    if (target.type === 'service') {
      listener.service = {
        name: target.name,
        type: target.serviceType,
        domain: target.domain,
      }
    }

    this.startListener0(listener)
  }

  private startListener0(listener: PlatformListener): void {
    listener.stateUpdateHandler = (state) =>
      this.eventLoop.execute(() => this.stateUpdate0(state))
    listener.newConnectionHandler = (connection) =>
      this.eventLoop.execute(() => this.newConnection0(connection))

    this.platformListener = listener
    try {
      listener.start(this.connectionQueue)
    } catch (error) {
      this.close0(toError(error))
    }
  }

  private stateUpdate0(state: ListenerState): void {
    switch (state.type) {
      case 'setup':
        throw new InvariantViolationError('listener reported its setup state', {
          channel: this.label,
        })
      case 'waiting':
        log('%s waiting: %s', this.label, state.error.message)
        return
      case 'ready':
        this.bindComplete0()
        return
      case 'cancelled':
        if (!this.closed) {
          throw new InvariantViolationError(
            'listener cancelled while the channel is open',
            { channel: this.label, state: this.lifecycle.state.type },
          )
        }
        this.platformListener = undefined
        return
      case 'failed':
        this.close0(new PlatformFailureError(state.error))
        return
    }
  }

  private bindComplete0(): void {
    const state = this.lifecycle.state
    if (state.type === 'closed') {
      log('%s ignoring ready after close', this.label)
      return
    }
    if (state.type !== 'activating') {
      throw new InvariantViolationError('listener ready twice', {
        channel: this.label,
        state: state.type,
      })
    }

    const resolved = resultOf(() => this.localAddress0())
    if (!resolved.ok) {
      log('%s bound without a local address: %s', this.label, resolved.error.message)
    }
    this.addressCache.store({
      local: resolved.ok ? resolved.value : undefined,
    })

    log('%s listening', this.label)
    this.becomeActive0('listening')
  }

  /**
   * The bound address, worked out from the platform listener. A requested
   * port of 0 is replaced by the port the platform assigned, and a host name
   * by the address the platform reports.
   */
  localAddress0(): SocketAddress {
    const listener = this.platformListener
    if (listener === undefined) {
      throw new IOOnClosedChannelError()
    }

    const endpoint = listener.parameters.requiredLocalEndpoint
    if (endpoint === undefined) {
      throw new UnableToResolveEndpointError('no local endpoint was required')
    }

    let address: SocketAddress
    try {
      address = endpointToSocketAddress(endpoint)
    } catch (error) {
      // host names only resolve to the address the platform bound
      const bound = listener.localAddress
      if (bound === undefined) {
        throw new UnableToResolveEndpointError(toError(error).message)
      }
      return bound
    }

    if (address.type === 'inet' && address.port === 0) {
      const port = listener.port
      if (port === undefined || port === 0) {
        throw new UnableToResolveEndpointError('no port was assigned')
      }
      address = withPort(address, port)
    }
    return address
  }

  private newConnection0(connection: PlatformConnection): void {
    const child = this.makeChildChannel(connection, this.childLoopGroup.next())
    // handed off before any read listener runs
    this.channelRead0(child)
    this.pipeline.fireChannelRead(child)
  }

  /**
   * Hand `child` to its own loop. From here on the child's failures are its
   * own: they close the child and never reach the listener.
   */
  protected channelRead0(child: ConnectionChannel): void {
    this.eventLoop.preconditionInEventLoop()

    const promise = child.eventLoop.makePromise<void>()
    child.eventLoop.execute(() => {
      child.registerAlreadyConfigured0(promise)
      promise.futureResult.whenFailure((error) => {
        log('%s child registration failed: %s', this.label, error.message)
        child.close0(error)
      })
    })
  }

  protected abstract makeChildChannel(
    connection: PlatformConnection,
    eventLoop: EventLoop,
  ): ConnectionChannel

  protected supportsOption(kind: ChannelOptionKind, access: OptionAccess): boolean {
    switch (kind) {
      case 'autoRead':
      case 'socket':
      case 'enablePeerToPeer':
      case 'allowLocalEndpointReuse':
      case 'multipathServiceType':
        return true
      case 'listener':
        return (
          access === 'get' && this.platform.capabilities.listenerIntrospection
        )
      default:
        return false
    }
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
        const raw = SocketOptionValueSchema.parse(value)
        if (isSameSocketOption(key, SocketOptionKeys.SO_REUSEADDR)) {
          this.reuseAddress = raw !== 0
        } else if (isSameSocketOption(key, SocketOptionKeys.SO_REUSEPORT)) {
          this.reusePort = raw !== 0
        } else {
          applyProtocolSocketOption(this.protocolOptions, key, raw)
        }
        return
      }
      case 'enablePeerToPeer':
        this.enablePeerToPeer = ChannelOptions.enablePeerToPeer.schema.parse(value)
        return
      case 'allowLocalEndpointReuse':
        this.allowLocalEndpointReuse =
          ChannelOptions.allowLocalEndpointReuse.schema.parse(value)
        return
      case 'multipathServiceType':
        this.multipathServiceType =
          ChannelOptions.multipathServiceType.schema.parse(value)
        return
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
        if (isSameSocketOption(key, SocketOptionKeys.SO_REUSEADDR)) {
          return this.reuseAddress ? 1 : 0
        }
        if (isSameSocketOption(key, SocketOptionKeys.SO_REUSEPORT)) {
          return this.reusePort ? 1 : 0
        }
        return protocolSocketOptionValue(this.protocolOptions, key)
      }
      case 'enablePeerToPeer':
        return this.enablePeerToPeer
      case 'allowLocalEndpointReuse':
        return this.allowLocalEndpointReuse
      case 'multipathServiceType':
        return this.multipathServiceType
      case 'listener':
        return this.platformListener
      default:
        throw new UnsupportedChannelOptionError(option.name, this.label)
    }
  }

  protected write0(_data: Uint8Array, promise: ChannelPromise<void>): void {
    promise.fail(
      this.closed
        ? new IOOnClosedChannelError()
        : new OperationUnsupportedError('write on a listener'),
    )
  }

  // nothing is ever buffered
  protected flush0(): void {}

  // autoRead is mandatory; accepts are pushed by the platform
  protected read0(): void {}

  protected triggerUserOutboundEvent0(
    event: OutboundUserEvent,
    promise: ChannelPromise<void>,
  ): void {
    switch (event.type) {
      case 'bindToEndpoint':
        this.bind0(event.endpoint, promise)
        return
      case 'custom':
        promise.fail(
          this.closed
            ? new IOOnClosedChannelError()
            : new OperationUnsupportedError(`outbound event ${event.name}`),
        )
        return
    }
  }

  protected doClose0(): void {
    this.platformListener?.cancel()
  }
}
