import { DispatchQueue } from '@berth/platform'
import type { SocketAddress } from '@berth/utils'
import debug from 'debug'
import { AddressCache } from './address-cache'
import type {
  Channel,
  CloseMode,
  OutboundUserEvent,
  SynchronousChannelOptions,
} from './channel'
import {
  IOOnClosedChannelError,
  OperationUnsupportedError,
  UnsupportedChannelOptionError,
} from './errors'
import type { EventLoop } from './event-loop'
import { type ChannelFuture, type ChannelPromise, resultOf } from './future'
import type { ChannelOption, ChannelOptionKind } from './options'
import { ChannelPipeline } from './pipeline'
import { ChannelStateMachine } from './state'

const log = debug('berth:channel')

export type OptionAccess = 'get' | 'set'

/**
 * Shared lifecycle plumbing for channels whose state is driven by a
 * platform primitive reporting on its own `DispatchQueue`.
 *
 * Public methods may be called from anywhere; each hops onto the owning
 * loop before touching state. The `*0` methods assume they already run
 * there.
 */
export abstract class StateManagedChannel<A> implements Channel {
  public readonly pipeline: ChannelPipeline
  /** Queue the platform primitive reports on; never the owning loop. */
  public readonly connectionQueue: DispatchQueue

  protected readonly lifecycle = new ChannelStateMachine<A>()
  protected readonly addressCache = new AddressCache()
  protected readonly closePromise: ChannelPromise<void>

  constructor(
    public readonly eventLoop: EventLoop,
    public readonly label: string,
  ) {
    this.pipeline = new ChannelPipeline(label)
    this.connectionQueue = new DispatchQueue(`${label}.connection`)
    this.closePromise = eventLoop.makePromise<void>()
  }

  abstract readonly parent: Channel | undefined
  abstract readonly isWritable: boolean

  get closeFuture(): ChannelFuture<void> {
    return this.closePromise.futureResult
  }

  get isActive(): boolean {
    return this.lifecycle.isActive
  }

  protected get closed(): boolean {
    return this.lifecycle.isClosed
  }

  get localAddress(): SocketAddress | undefined {
    return this.addressCache.local
  }

  get remoteAddress(): SocketAddress | undefined {
    return this.addressCache.remote
  }

  get syncOptions(): SynchronousChannelOptions | undefined {
    return undefined
  }

  setOption<V>(option: ChannelOption<V>, value: V): ChannelFuture<void> {
    this.assertOptionSupported(option, 'set')
    if (this.eventLoop.inEventLoop) {
      return this.eventLoop.makeCompletedFuture(
        resultOf(() => this.setOption0(option, value)),
      )
    }
    return this.eventLoop.submit(() => this.setOption0(option, value))
  }

  getOption<V>(option: ChannelOption<V>): ChannelFuture<V> {
    this.assertOptionSupported(option, 'get')
    if (this.eventLoop.inEventLoop) {
      return this.eventLoop.makeCompletedFuture(
        resultOf(() => this.getOption0(option)),
      )
    }
    return this.eventLoop.submit(() => this.getOption0(option))
  }

  setOption0<V>(option: ChannelOption<V>, value: V): void {
    this.eventLoop.preconditionInEventLoop()
    if (this.closed) {
      throw new IOOnClosedChannelError()
    }
    this.writeOption0(option, option.schema.parse(value))
  }

  getOption0<V>(option: ChannelOption<V>): V {
    this.eventLoop.preconditionInEventLoop()
    if (this.closed) {
      throw new IOOnClosedChannelError()
    }
    return option.schema.parse(this.readOption0(option))
  }

  write(data: Uint8Array): ChannelFuture<void> {
    const promise = this.eventLoop.makePromise<void>()
    this.runOnLoop(() => this.write0(data, promise))
    return promise.futureResult
  }

  flush(): void {
    this.runOnLoop(() => this.flush0())
  }

  read(): void {
    this.runOnLoop(() => this.read0())
  }

  close(mode: CloseMode = 'all'): ChannelFuture<void> {
    const promise = this.eventLoop.makePromise<void>()
    this.runOnLoop(() => {
      if (mode === 'all') {
        this.close0(new IOOnClosedChannelError(), promise)
      } else {
        this.doHalfClose0(mode, promise)
      }
    })
    return promise.futureResult
  }

  triggerUserOutboundEvent(event: OutboundUserEvent): ChannelFuture<void> {
    const promise = this.eventLoop.makePromise<void>()
    this.runOnLoop(() => this.triggerUserOutboundEvent0(event, promise))
    return promise.futureResult
  }

  /**
   * The single path every close takes, whatever started it. Completes the
   * pending activation promise and the close future exactly once.
   */
  close0(error: Error, promise?: ChannelPromise<void>): void {
    this.eventLoop.preconditionInEventLoop()

    const previous = this.lifecycle.close(error)
    if (previous === undefined) {
      promise?.fail(new IOOnClosedChannelError())
      return
    }
    log('%s closing from %s: %s', this.label, previous.type, error.message)

    this.doClose0(error)

    switch (previous.type) {
      case 'activating':
        previous.promise?.fail(error)
        break
      case 'active':
        this.pipeline.fireChannelInactive()
        break
      default:
        break
    }

    promise?.succeed()
    this.closePromise.succeed()
  }

  protected becomeActive0(substate: A): void {
    const promise = this.lifecycle.becomeActive(substate)
    this.pipeline.fireChannelActive()
    promise?.succeed()
  }

  protected doHalfClose0(mode: CloseMode, promise: ChannelPromise<void>): void {
    promise.fail(
      this.closed
        ? new IOOnClosedChannelError()
        : new OperationUnsupportedError(`close(${mode})`),
    )
  }

  protected runOnLoop(task: () => void): void {
    if (this.eventLoop.inEventLoop) {
      task()
    } else {
      this.eventLoop.execute(task)
    }
  }

  protected assertOptionSupported<V>(
    option: ChannelOption<V>,
    access: OptionAccess,
  ): void {
    if (!this.supportsOption(option.kind, access)) {
      throw new UnsupportedChannelOptionError(
        `${access} ${option.name}`,
        this.constructor.name,
      )
    }
  }

  protected abstract supportsOption(
    kind: ChannelOptionKind,
    access: OptionAccess,
  ): boolean
  protected abstract writeOption0<V>(option: ChannelOption<V>, value: V): void
  protected abstract readOption0<V>(option: ChannelOption<V>): unknown
  protected abstract write0(data: Uint8Array, promise: ChannelPromise<void>): void
  protected abstract flush0(): void
  protected abstract read0(): void
  protected abstract triggerUserOutboundEvent0(
    event: OutboundUserEvent,
    promise: ChannelPromise<void>,
  ): void
  protected abstract doClose0(error: Error): void
}
