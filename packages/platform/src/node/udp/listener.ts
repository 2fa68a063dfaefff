import dgram, { type RemoteInfo } from 'node:dgram'
import { inetSocketAddress, type SocketAddress } from '@berth/utils'
import debug from 'debug'
import type { DispatchQueue } from '../../dispatch-queue'
import { InvalidParametersError, ListenerStateError } from '../../errors'
import type {
  ListenerState,
  ListenerStateHandler,
  NewConnectionHandler,
  PlatformListener,
} from '../../listener'
import type { ListenerParameters, ServiceAdvertisement } from '../../parameters'
import type { DatagramProtocolOptions } from '../../protocol-options'
import { addressOf, toDatagramSocketOptions } from '../utils'
import { DatagramFlow } from './flow'
import type {
  DatagramFlowOwner,
  DatagramSocket,
  DatagramSocketFactory,
} from './types'

const log = debug('berth:platform:udp:listener')

const defaultSocketFactory: DatagramSocketFactory = (options) =>
  dgram.createSocket(options)

/**
 * Datagram listener over one bound `dgram` socket. Each new remote
 * address/port pair becomes a `DatagramFlow` reported as a new connection.
 *
 * The socket is shared, so it stays open after `cancel` until the last flow
 * is released.
 */
export class UdpListener implements PlatformListener, DatagramFlowOwner {
  public service?: ServiceAdvertisement
  public stateUpdateHandler?: ListenerStateHandler
  public newConnectionHandler?: NewConnectionHandler

  private current: ListenerState = { type: 'setup' }
  private readonly datagram: DatagramProtocolOptions
  private readonly flows = new Map<string, DatagramFlow>()
  private socket: DatagramSocket | undefined
  private queue: DispatchQueue | undefined
  private boundPort: number | undefined
  private local: SocketAddress | undefined
  private accepting = false
  private cancelRequested = false
  private socketClosed = false

  constructor(
    public readonly parameters: ListenerParameters,
    private readonly createSocket: DatagramSocketFactory = defaultSocketFactory,
  ) {
    if (parameters.protocol.kind !== 'datagram') {
      throw new InvalidParametersError(
        'udp listeners take datagram protocol options',
        { kind: parameters.protocol.kind },
      )
    }
    if (parameters.requiredLocalEndpoint?.type === 'unix') {
      throw new InvalidParametersError(
        'udp listeners cannot bind a unix path',
        { path: parameters.requiredLocalEndpoint.path },
      )
    }
    this.datagram = parameters.protocol.options
  }

  get state(): ListenerState {
    return this.current
  }

  get port(): number | undefined {
    return this.boundPort
  }

  get localAddress(): SocketAddress | undefined {
    return this.local
  }

  get flowCount(): number {
    return this.flows.size
  }

  start(queue: DispatchQueue): void {
    if (this.queue !== undefined || this.current.type !== 'setup') {
      throw new ListenerStateError('listener already started')
    }
    this.queue = queue

    const socket = this.createSocket(
      toDatagramSocketOptions(this.parameters, this.datagram),
    )
    socket.on('listening', () => {
      const address = socket.address()
      this.boundPort = address.port
      this.local = addressOf(address.address, address.port)
      socket.setBroadcast(this.datagram.broadcast)
      if (this.datagram.ttl !== undefined) socket.setTTL(this.datagram.ttl)
      this.accepting = !this.cancelRequested
      log('listening on %s:%d', address.address, address.port)
      this.transition({ type: 'ready' })
    })
    socket.on('error', (error) => {
      log('socket error: %s', error.message)
      for (const flow of this.flows.values()) {
        flow.fail(error)
      }
      this.transition({ type: 'failed', error })
    })
    socket.on('message', (msg, rinfo) => this.onMessage(msg, rinfo))
    this.socket = socket

    const endpoint = this.parameters.requiredLocalEndpoint
    if (endpoint?.type === 'hostPort') {
      socket.bind(endpoint.port, endpoint.host)
    } else {
      socket.bind(0)
    }
  }

  cancel(): void {
    if (this.cancelRequested) return
    this.cancelRequested = true
    this.accepting = false
    this.closeSocketIfIdle()
    this.transition({ type: 'cancelled' })
  }

  sendTo(
    data: Uint8Array,
    host: string,
    port: number,
    completion: (error?: Error) => void,
  ): void {
    const socket = this.socket
    if (socket === undefined || this.socketClosed) {
      completion(new ListenerStateError('datagram socket is closed'))
      return
    }
    socket.send(data, port, host, (error) => completion(error ?? undefined))
  }

  release(key: string): void {
    this.flows.delete(key)
    this.closeSocketIfIdle()
  }

  private onMessage(msg: Buffer, rinfo: RemoteInfo): void {
    const key = `${rinfo.address}:${rinfo.port}`
    const existing = this.flows.get(key)
    if (existing !== undefined) {
      existing.deliver(msg)
      return
    }

    const queue = this.queue
    if (!this.accepting || queue === undefined) {
      log('dropping datagram from %s: listener is not accepting', key)
      return
    }

    const flow = new DatagramFlow(
      this,
      key,
      inetSocketAddress(rinfo.address, rinfo.port),
      this.local,
    )
    this.flows.set(key, flow)
    flow.deliver(msg)
    log('new flow from %s', key)

    queue.async(() => {
      if (this.newConnectionHandler === undefined) {
        flow.cancel()
        return
      }
      this.newConnectionHandler(flow)
    })
  }

  private closeSocketIfIdle(): void {
    if (!this.cancelRequested || this.flows.size > 0) return
    const socket = this.socket
    if (socket === undefined || this.socketClosed) return
    this.socketClosed = true
    socket.close(() => log('socket closed'))
  }

  private transition(next: ListenerState): void {
    const queue = this.queue
    if (queue === undefined) {
      this.current = next
      return
    }
    queue.async(() => {
      if (this.current.type === 'cancelled') return
      this.current = next
      this.stateUpdateHandler?.(next)
    })
  }
}
