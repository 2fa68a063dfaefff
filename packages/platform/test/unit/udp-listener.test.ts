import { EventEmitter } from 'node:events'
import type { SocketOptions } from 'node:dgram'
import type { AddressInfo } from 'node:net'
import { describe, expect, it } from 'vitest'
import {
  createListenerParameters,
  type DatagramSocket,
  datagramProtocol,
  DispatchQueue,
  InvalidParametersError,
  type ListenerState,
  type PlatformConnection,
  streamProtocol,
  UdpListener,
} from '../../src'
import { settle } from './helpers'

class FakeDatagramSocket extends EventEmitter implements DatagramSocket {
  public bound: { port: number; address: string } | undefined
  public closed = false
  public broadcast: boolean | undefined
  public ttl: number | undefined
  public readonly sent: Array<{ data: string; port: number; address: string }> = []

  constructor(
    public readonly options: SocketOptions,
    private readonly assignedPort: number,
  ) {
    super()
  }

  bind(port = 0, address = '0.0.0.0'): this {
    this.bound = { port: port === 0 ? this.assignedPort : port, address }
    return this
  }

  close(callback?: () => void): this {
    this.closed = true
    callback?.()
    return this
  }

  send(
    msg: Uint8Array,
    port: number,
    address: string,
    callback?: (error: Error | null) => void,
  ): void {
    this.sent.push({ data: Buffer.from(msg).toString(), port, address })
    callback?.(null)
  }

  address(): AddressInfo {
    if (this.bound === undefined) throw new Error('not bound')
    return { address: this.bound.address, family: 'IPv4', port: this.bound.port }
  }

  setBroadcast(flag: boolean): void {
    this.broadcast = flag
  }

  setTTL(ttl: number): number {
    this.ttl = ttl
    return ttl
  }

  receive(data: string, address: string, port: number): void {
    this.emit('message', Buffer.from(data), {
      address,
      port,
      family: 'IPv4',
      size: data.length,
    })
  }
}

function setup(ttl?: number) {
  const parameters = createListenerParameters(datagramProtocol({ ttl }))
  parameters.requiredLocalEndpoint = { type: 'hostPort', host: '0.0.0.0', port: 0 }

  const sockets: FakeDatagramSocket[] = []
  const listener = new UdpListener(parameters, (options) => {
    const socket = new FakeDatagramSocket(options, 40000)
    sockets.push(socket)
    return socket
  })

  const states: ListenerState['type'][] = []
  const connections: PlatformConnection[] = []
  listener.stateUpdateHandler = (state) => states.push(state.type)
  listener.newConnectionHandler = (connection) => connections.push(connection)

  const queue = new DispatchQueue('test.udp')
  listener.start(queue)
  const socket = sockets[0]
  if (socket === undefined) throw new Error('no socket created')

  return { listener, socket, queue, states, connections }
}

describe('UdpListener', () => {
  it('should reject stream protocol options', () => {
    expect(() => new UdpListener(createListenerParameters(streamProtocol()))).toThrow(
      InvalidParametersError,
    )
  })

  it('should reject unix endpoints', () => {
    const parameters = createListenerParameters(datagramProtocol())
    parameters.requiredLocalEndpoint = { type: 'unix', path: '/tmp/berth.sock' }
    expect(() => new UdpListener(parameters)).toThrow(
      'udp listeners cannot bind a unix path',
    )
  })

  it('should report ready with the bound port once listening', async () => {
    const { listener, socket, states } = setup(32)

    expect(socket.options.type).toBe('udp4')
    socket.emit('listening')
    await settle()

    expect(states).toEqual(['ready'])
    expect(listener.port).toBe(40000)
    expect(socket.broadcast).toBe(false)
    expect(socket.ttl).toBe(32)
  })

  it('should open one flow per remote peer and replay early datagrams', async () => {
    const { listener, socket, queue, connections } = setup()
    socket.emit('listening')
    await settle()

    socket.receive('hello', '10.0.0.2', 5000)
    socket.receive('again', '10.0.0.2', 5000)
    socket.receive('other', '10.0.0.3', 5000)
    await settle()

    expect(connections).toHaveLength(2)
    expect(listener.flowCount).toBe(2)

    const received: string[] = []
    const flow = connections[0]
    if (flow === undefined) throw new Error('missing flow')
    flow.receiveHandler = (data) => received.push(Buffer.from(data).toString())
    flow.start(queue)
    await settle()

    expect(received).toEqual(['hello', 'again'])
    expect(flow.remoteAddress).toEqual({
      type: 'inet',
      family: 4,
      host: '10.0.0.2',
      port: 5000,
    })
  })

  it('should send replies to the flow peer through the shared socket', async () => {
    const { socket, queue, connections } = setup()
    socket.emit('listening')
    await settle()
    socket.receive('ping', '10.0.0.2', 5000)
    await settle()

    const flow = connections[0]
    if (flow === undefined) throw new Error('missing flow')
    flow.start(queue)

    const completions: Array<Error | undefined> = []
    flow.send(Buffer.from('pong'), (error) => completions.push(error))
    await settle()

    expect(socket.sent).toEqual([{ data: 'pong', port: 5000, address: '10.0.0.2' }])
    expect(completions).toEqual([undefined])
  })

  it('should keep the socket open until the last flow is released', async () => {
    const { listener, socket, connections, states } = setup()
    socket.emit('listening')
    await settle()
    socket.receive('hello', '10.0.0.2', 5000)
    await settle()

    listener.cancel()
    await settle()
    expect(states).toEqual(['ready', 'cancelled'])
    expect(socket.closed).toBe(false)

    socket.receive('late', '10.0.0.9', 6000)
    await settle()
    expect(connections).toHaveLength(1)

    connections[0]?.cancel()
    expect(listener.flowCount).toBe(0)
    expect(socket.closed).toBe(true)
  })

  it('should fail every flow when the socket errors', async () => {
    const { socket, queue, connections, states } = setup()
    socket.emit('listening')
    await settle()
    socket.receive('hello', '10.0.0.2', 5000)
    await settle()

    const flow = connections[0]
    if (flow === undefined) throw new Error('missing flow')
    flow.start(queue)
    await settle()

    socket.emit('error', new Error('boom'))
    await settle()

    expect(states).toEqual(['ready', 'failed'])
    expect(flow.state).toEqual({ type: 'failed', error: new Error('boom') })
  })
})
