import { isMultiaddr, type Multiaddr } from '@multiformats/multiaddr'
import {
  createNodePlatform,
  DatagramProtocolOptions,
  type Endpoint,
  endpointFromMultiaddr,
  type ListenerPlatform,
  type ParametersConfigurator,
  type PlatformListener,
  StreamProtocolOptions,
  type TransportKind,
} from '@berth/platform'
import { toError } from '@berth/utils'
import debug from 'debug'
import type { Channel } from './channel'
import type { ListenerConfig } from './config'
import type {
  ChildChannelInitializer,
  ConnectionChannel,
} from './connection-channel'
import { UnsupportedChannelOptionError } from './errors'
import type { EventLoopGroup } from './event-loop-group'
import type { ChannelFuture } from './future'
import { DatagramListenerChannel } from './listener/datagram-listener-channel'
import type { StateManagedListenerChannel } from './listener/state-managed-listener-channel'
import { StreamListenerChannel } from './listener/stream-listener-channel'
import { type ChannelOption, ChannelOptions } from './options'

const log = debug('berth:bootstrap')

type OptionSetter<C extends Channel> = (channel: C) => ChannelFuture<void>

/**
 * Builds listener channels. Server options are applied to the listener
 * before it binds; child options are applied to every accepted child
 * before the child initializer runs.
 *
 * ```ts
 * const group = new EventLoopGroup(2)
 * const channel = await new ListenerBootstrap(group)
 *   .serverChannelOption(ChannelOptions.reuseAddress, 1)
 *   .childChannelInitializer((child) => {
 *     child.pipeline.events.on('read', (data) => console.log(data))
 *   })
 *   .bind(hostPort('0.0.0.0', 0))
 * ```
 */
export class ListenerBootstrap {
  private listenerPlatform: ListenerPlatform | undefined
  private transportKind: TransportKind = 'stream'
  private stream = new StreamProtocolOptions()
  private childStream = new StreamProtocolOptions()
  private datagram = new DatagramProtocolOptions()
  private childDatagram = new DatagramProtocolOptions()
  private configurator: ParametersConfigurator | undefined
  private childInit: ChildChannelInitializer | undefined
  private readonly serverOptions: OptionSetter<StateManagedListenerChannel>[] = []
  private readonly childOptions: OptionSetter<ConnectionChannel>[] = []

  constructor(
    private readonly group: EventLoopGroup,
    private readonly childGroup: EventLoopGroup = group,
  ) {}

  static fromConfig(
    config: ListenerConfig,
    group: EventLoopGroup,
    childGroup?: EventLoopGroup,
  ): ListenerBootstrap {
    const bootstrap = new ListenerBootstrap(group, childGroup)
      .serverChannelOption(ChannelOptions.reuseAddress, config.reuseAddress ? 1 : 0)
      .serverChannelOption(ChannelOptions.reusePort, config.reusePort ? 1 : 0)
      .serverChannelOption(
        ChannelOptions.allowLocalEndpointReuse,
        config.allowLocalEndpointReuse,
      )
      .serverChannelOption(ChannelOptions.enablePeerToPeer, config.enablePeerToPeer)
      .serverChannelOption(ChannelOptions.multipathServiceType, config.multipath)

    switch (config.transport) {
      case 'stream':
        return bootstrap
          .streamOptions(new StreamProtocolOptions(config.stream))
          .childStreamOptions(new StreamProtocolOptions(config.childStream))
      case 'datagram':
        return bootstrap
          .datagramOptions(new DatagramProtocolOptions(config.datagram))
          .childDatagramOptions(new DatagramProtocolOptions(config.childDatagram))
    }
  }

  /** Defaults to the Node.js platform. */
  platform(platform: ListenerPlatform): this {
    this.listenerPlatform = platform
    return this
  }

  transport(kind: TransportKind): this {
    this.transportKind = kind
    return this
  }

  streamOptions(options: StreamProtocolOptions): this {
    this.transportKind = 'stream'
    this.stream = options
    return this
  }

  childStreamOptions(options: StreamProtocolOptions): this {
    this.childStream = options
    return this
  }

  datagramOptions(options: DatagramProtocolOptions): this {
    this.transportKind = 'datagram'
    this.datagram = options
    return this
  }

  childDatagramOptions(options: DatagramProtocolOptions): this {
    this.childDatagram = options
    return this
  }

  serverChannelOption<V>(option: ChannelOption<V>, value: V): this {
    this.serverOptions.push((channel) => channel.setOption(option, value))
    return this
  }

  /** Children accept only `autoRead` and socket options. */
  childChannelOption<V>(option: ChannelOption<V>, value: V): this {
    if (option.kind !== 'autoRead' && option.kind !== 'socket') {
      throw new UnsupportedChannelOptionError(option.name, 'ConnectionChannel')
    }
    this.childOptions.push((channel) => channel.setOption(option, value))
    return this
  }

  configureParameters(configurator: ParametersConfigurator): this {
    this.configurator = configurator
    return this
  }

  childChannelInitializer(initializer: ChildChannelInitializer): this {
    this.childInit = initializer
    return this
  }

  /** Create a listener channel and bind it to `target`. */
  async bind(target: Endpoint | Multiaddr): Promise<StateManagedListenerChannel> {
    const endpoint = isMultiaddr(target) ? endpointFromMultiaddr(target) : target
    return this.activate(this.makeChannel(), (channel) =>
      channel.activate(endpoint),
    )
  }

  /** Wrap a platform listener built elsewhere; it must not be started yet. */
  async withPlatformListener(
    listener: PlatformListener,
  ): Promise<StateManagedListenerChannel> {
    return this.activate(this.makeChannel(listener), (channel) =>
      channel.adoptPreconfigured(),
    )
  }

  private async activate(
    channel: StateManagedListenerChannel,
    start: (channel: StateManagedListenerChannel) => ChannelFuture<void>,
  ): Promise<StateManagedListenerChannel> {
    try {
      for (const apply of this.serverOptions) {
        await apply(channel)
      }
      await start(channel)
    } catch (error) {
      log('%s failed to activate: %s', channel.label, toError(error).message)
      // fails with IOOnClosed when the platform already closed it
      channel.close()
      throw error
    }
    log('%s bound to %o', channel.label, channel.localAddress)
    return channel
  }

  private makeChannel(listener?: PlatformListener): StateManagedListenerChannel {
    const common = {
      eventLoop: this.group.next(),
      childLoopGroup: this.childGroup,
      platform: this.listenerPlatform ?? createNodePlatform(),
      childChannelInitializer: this.makeChildInitializer(),
      parametersConfigurator: this.configurator,
      listener,
    }

    switch (this.transportKind) {
      case 'stream':
        return new StreamListenerChannel({
          ...common,
          protocolOptions: this.stream.clone(),
          childProtocolOptions: this.childStream.clone(),
        })
      case 'datagram':
        return new DatagramListenerChannel({
          ...common,
          protocolOptions: this.datagram.clone(),
          childProtocolOptions: this.childDatagram.clone(),
        })
    }
  }

  private makeChildInitializer(): ChildChannelInitializer | undefined {
    const options = [...this.childOptions]
    const initializer = this.childInit
    if (options.length === 0) return initializer

    return async (child) => {
      for (const apply of options) {
        await apply(child)
      }
      await initializer?.(child)
    }
  }
}
