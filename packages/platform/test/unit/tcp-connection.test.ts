import net from 'node:net'
import { afterEach, describe, expect, it } from 'vitest'
import {
  type ConnectionState,
  datagramProtocol,
  DispatchQueue,
  InvalidParametersError,
  ListenerStateError,
  streamProtocol,
  TcpConnection,
} from '../../src'
import { until } from './helpers'

const encoder = new TextEncoder()
const decoder = new TextDecoder()

interface SocketPair {
  server: net.Server
  client: net.Socket
  accepted: net.Socket
}

async function socketPair(): Promise<SocketPair> {
  const sockets: net.Socket[] = []
  const server = net.createServer((socket) => sockets.push(socket))
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve))
  const address = server.address()
  if (address === null || typeof address === 'string') {
    throw new Error('server has no port')
  }
  const client = net.connect(address.port, '127.0.0.1')
  await until(() => sockets.length > 0)
  const [accepted] = sockets
  if (accepted === undefined) throw new Error('no socket accepted')
  return { server, client, accepted }
}

describe('TcpConnection', () => {
  const pairs: SocketPair[] = []

  async function open(): Promise<{
    pair: SocketPair
    connection: TcpConnection
    states: ConnectionState[]
  }> {
    const pair = await socketPair()
    pairs.push(pair)
    const connection = new TcpConnection(pair.accepted)
    const states: ConnectionState[] = []
    connection.stateUpdateHandler = (state) => states.push(state)
    return { pair, connection, states }
  }

  afterEach(async () => {
    for (const { server, client, accepted } of pairs.splice(0)) {
      client.destroy()
      accepted.destroy()
      await new Promise<void>((resolve) => server.close(() => resolve()))
    }
  })

  it('should report ready and both addresses once started', async () => {
    const { pair, connection, states } = await open()
    connection.start(new DispatchQueue('test.conn'))
    await until(() => states.length > 0)

    expect(states).toEqual([{ type: 'ready' }])
    expect(connection.localAddress).toEqual({
      type: 'inet',
      family: 4,
      host: '127.0.0.1',
      port: pair.accepted.localPort,
    })
    expect(connection.remoteAddress).toEqual({
      type: 'inet',
      family: 4,
      host: '127.0.0.1',
      port: pair.client.localPort,
    })
  })

  it('should deliver received bytes and send writes', async () => {
    const { pair, connection } = await open()
    const received: string[] = []
    connection.receiveHandler = (data) => received.push(decoder.decode(data))
    connection.start(new DispatchQueue('test.conn'))

    const echoed: string[] = []
    pair.client.on('data', (chunk: Buffer) => echoed.push(chunk.toString()))
    pair.client.write('ping')
    await until(() => received.join('') === 'ping')

    const sent: Array<Error | undefined> = []
    connection.send(encoder.encode('pong'), (error) => sent.push(error))
    await until(() => echoed.join('') === 'pong' && sent.length > 0)

    expect(sent).toEqual([undefined])
  })

  it('should report end of stream when the peer ends', async () => {
    const { pair, connection } = await open()
    let ended = false
    connection.endOfStreamHandler = () => {
      ended = true
    }
    connection.start(new DispatchQueue('test.conn'))

    pair.client.end()
    await until(() => ended)
  })

  it('should destroy the socket and report cancelled once', async () => {
    const { pair, connection, states } = await open()
    connection.start(new DispatchQueue('test.conn'))
    await until(() => states.length > 0)

    connection.cancel()
    connection.cancel()
    await until(() => states.length > 1)

    expect(states.map((state) => state.type)).toEqual(['ready', 'cancelled'])
    expect(pair.accepted.destroyed).toBe(true)
  })

  it('should apply stream options to the socket', async () => {
    const { connection } = await open()
    expect(() =>
      connection.applyProtocolOptions(
        streamProtocol({ noDelay: true, keepAlive: true, keepAliveIdle: 5 }),
      ),
    ).not.toThrow()
    expect(() => connection.applyProtocolOptions(datagramProtocol())).toThrow(
      InvalidParametersError,
    )
  })

  it('should refuse to start twice or send before start', async () => {
    const { connection } = await open()
    expect(() => connection.send(encoder.encode('x'), () => {})).toThrow(
      ListenerStateError,
    )
    connection.start(new DispatchQueue('test.conn'))
    expect(() => connection.start(new DispatchQueue('test.conn'))).toThrow(
      ListenerStateError,
    )
  })
})
