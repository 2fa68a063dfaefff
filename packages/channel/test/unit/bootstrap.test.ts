import { multiaddr } from '@multiformats/multiaddr'
import {
  createListenerParameters,
  hostPort,
  SocketOptionKeys,
  StreamProtocolOptions,
  streamProtocol,
} from '@berth/platform'
import { afterEach, describe, expect, it } from 'vitest'
import {
  ChannelOptions,
  type ConnectionChannel,
  DatagramListenerChannel,
  EventLoopGroup,
  ListenerBootstrap,
  listenerConfigEndpoint,
  parseListenerConfig,
  PlatformFailureError,
  StreamListenerChannel,
  UnsupportedChannelOptionError,
} from '../../src'
import { FakeConnection, FakeListener, FakePlatform } from './helpers/fake-platform'
import { settle } from './helpers/harness'

describe('ListenerBootstrap', () => {
  let group = new EventLoopGroup(1)
  let platform = new FakePlatform()

  afterEach(async () => {
    await group.shutdownGracefully()
    group = new EventLoopGroup(1)
    platform = new FakePlatform()
  })

  it('should apply server options and the configurator before binding', async () => {
    const bound = new ListenerBootstrap(group)
      .platform(platform)
      .serverChannelOption(ChannelOptions.reusePort, 1)
      .configureParameters((parameters) => {
        parameters.requiredInterface = 'lo0'
      })
      .bind(hostPort('0.0.0.0', 0))
    await settle()

    const listener = platform.last
    expect(listener.parameters.allowLocalEndpointReuse).toBe(true)
    expect(listener.parameters.requiredInterface).toBe('lo0')

    listener.notify({ type: 'ready' }, 4100)
    const channel = await bound

    expect(channel).toBeInstanceOf(StreamListenerChannel)
    expect(channel.eventLoop).toBe(group.loops[0])
    expect(channel.localAddress).toEqual({
      type: 'inet',
      family: 4,
      host: '0.0.0.0',
      port: 4100,
    })
  })

  it('should bind to a multiaddr', async () => {
    const bound = new ListenerBootstrap(group)
      .platform(platform)
      .bind(multiaddr('/ip4/127.0.0.1/tcp/0'))
    await settle()

    expect(platform.last.parameters.requiredLocalEndpoint).toEqual({
      type: 'hostPort',
      host: '127.0.0.1',
      port: 0,
    })
    platform.last.notify({ type: 'ready' }, 9100)
    const channel = await bound
    expect(channel.localAddress).toEqual({
      type: 'inet',
      family: 4,
      host: '127.0.0.1',
      port: 9100,
    })
  })

  it('should reject and close the channel when binding fails', async () => {
    const bound = new ListenerBootstrap(group)
      .platform(platform)
      .bind(hostPort('0.0.0.0', 0))
    await settle()

    const listener = platform.last
    listener.notify({ type: 'failed', error: new Error('address in use') })

    await expect(bound).rejects.toBeInstanceOf(PlatformFailureError)
    await settle()
    expect(listener.cancelCount).toBe(1)
  })

  it('should reject a server option the listener refuses', async () => {
    const bound = new ListenerBootstrap(group)
      .platform(platform)
      .serverChannelOption(ChannelOptions.socketOption(SocketOptionKeys.IP_TTL), 3)
      .bind(hostPort('0.0.0.0', 0))

    await expect(bound).rejects.toThrow(
      'socket option IPPROTO_IP/IP_TTL is not supported by this transport',
    )
    expect(platform.listeners).toHaveLength(0)
  })

  it('should build a datagram listener from configuration', async () => {
    const config = parseListenerConfig({
      transport: 'datagram',
      port: 5353,
      reuseAddress: true,
      enablePeerToPeer: true,
      datagram: { ttl: 8 },
    })

    const bound = ListenerBootstrap.fromConfig(config, group)
      .platform(platform)
      .bind(listenerConfigEndpoint(config))
    await settle()

    const parameters = platform.last.parameters
    expect(parameters.protocol.kind).toBe('datagram')
    expect(parameters.protocol.options.valueFor(SocketOptionKeys.IP_TTL)).toBe(8)
    expect(parameters.allowLocalEndpointReuse).toBe(true)
    expect(parameters.includePeerToPeer).toBe(true)
    expect(parameters.requiredLocalEndpoint).toEqual({
      type: 'hostPort',
      host: '0.0.0.0',
      port: 5353,
    })

    platform.last.notify({ type: 'ready' })
    const channel = await bound

    expect(channel).toBeInstanceOf(DatagramListenerChannel)
    expect(channel.localAddress).toEqual({
      type: 'inet',
      family: 4,
      host: '0.0.0.0',
      port: 5353,
    })
  })

  it('should not share protocol options between channels', async () => {
    const options = new StreamProtocolOptions({ noDelay: true })
    const bootstrap = new ListenerBootstrap(group)
      .platform(platform)
      .streamOptions(options)

    void bootstrap.bind(hostPort('0.0.0.0', 7001))
    void bootstrap.bind(hostPort('0.0.0.0', 7002))
    await settle()

    const [first, second] = platform.listeners
    if (first === undefined || second === undefined) {
      throw new Error('expected two listeners')
    }
    expect(first.parameters.protocol.options).not.toBe(options)
    expect(first.parameters.protocol.options).not.toBe(
      second.parameters.protocol.options,
    )
    expect(first.parameters.protocol.options.valueFor(SocketOptionKeys.TCP_NODELAY)).toBe(1)
  })

  it('should refuse child options a connection does not support', () => {
    const bootstrap = new ListenerBootstrap(group)
    expect(() =>
      bootstrap.childChannelOption(ChannelOptions.enablePeerToPeer, true),
    ).toThrow(UnsupportedChannelOptionError)
    expect(() =>
      bootstrap.childChannelOption(ChannelOptions.autoRead, true),
    ).not.toThrow()
  })

  it('should apply child options before the child initializer', async () => {
    const seen: number[] = []
    const children: ConnectionChannel[] = []
    const noDelay = ChannelOptions.socketOption(SocketOptionKeys.TCP_NODELAY)
    const childGroup = new EventLoopGroup(2)

    const bound = new ListenerBootstrap(group, childGroup)
      .platform(platform)
      .childChannelOption(noDelay, 1)
      .childChannelInitializer(async (child) => {
        children.push(child)
        seen.push(await child.getOption(noDelay))
      })
      .bind(hostPort('0.0.0.0', 0))
    await settle()
    platform.last.notify({ type: 'ready' }, 4200)
    await bound

    const connection = new FakeConnection()
    platform.last.accept(connection)
    await settle(30)

    expect(seen).toEqual([1])
    expect(children).toHaveLength(1)
    expect(childGroup.loops).toContain(children[0]?.eventLoop)
    expect(children[0]?.isActive).toBe(true)
    const applied = connection.applied[0]
    expect(applied?.kind === 'stream' && applied.options.noDelay).toBe(true)

    await childGroup.shutdownGracefully()
  })

  it('should start a preconfigured listener', async () => {
    const parameters = createListenerParameters(streamProtocol())
    parameters.requiredLocalEndpoint = hostPort('127.0.0.1', 6000)
    const listener = new FakeListener(parameters)

    const adopted = new ListenerBootstrap(group)
      .platform(platform)
      .serverChannelOption(ChannelOptions.enablePeerToPeer, true)
      .withPlatformListener(listener)
    await settle()

    expect(listener.startCount).toBe(1)
    expect(platform.listeners).toHaveLength(0)
    listener.notify({ type: 'ready' })
    const channel = await adopted

    expect(channel.isActive).toBe(true)
    expect(channel.localAddress).toEqual({
      type: 'inet',
      family: 4,
      host: '127.0.0.1',
      port: 6000,
    })
  })
})
