import net, { type Server, type Socket } from 'node:net'
import type { SocketAddress } from '@berth/utils'
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
import type { StreamProtocolOptions } from '../../protocol-options'
import { addressOf, toListenOptions, toServerOptions } from '../utils'
import { TcpConnection } from './connection'

const log = debug('berth:platform:tcp:listener')

/**
 * Stream listener over `net.Server`. Server events are translated into
 * listener states and delivered, like accepted sockets, on the start queue.
 */
export class TcpListener implements PlatformListener {
  public service?: ServiceAdvertisement
  public stateUpdateHandler?: ListenerStateHandler
  public newConnectionHandler?: NewConnectionHandler

  private current: ListenerState = { type: 'setup' }
  private readonly stream: StreamProtocolOptions
  private server: Server | undefined
  private queue: DispatchQueue | undefined
  private boundPort: number | undefined
  private local: SocketAddress | undefined
  private addr = 'unknown'
  private accepting = false
  private cancelRequested = false

  constructor(public readonly parameters: ListenerParameters) {
    if (parameters.protocol.kind !== 'stream') {
      throw new InvalidParametersError(
        'tcp listeners take stream protocol options',
        { kind: parameters.protocol.kind },
      )
    }
    this.stream = parameters.protocol.options
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

  start(queue: DispatchQueue): void {
    if (this.queue !== undefined || this.current.type !== 'setup') {
      throw new ListenerStateError('listener already started')
    }
    this.queue = queue

    const server = net.createServer(toServerOptions(this.stream), (socket) =>
      this.onSocket(socket),
    )
    server
      .on('listening', () => {
        this.onListen(server)
        // a host lookup can finish binding after cancel
        if (this.cancelRequested) {
          log('cancelled before listening on %s, closing', this.addr)
          this.closeServer(server)
          return
        }
        this.accepting = true
        log('listening on %s', this.addr)
        this.transition({ type: 'ready' })
      })
      .on('error', (error) => {
        log('server error on %s: %s', this.addr, error.message)
        this.transition({ type: 'failed', error })
      })
      .on('close', () => {
        log('server on %s closed', this.addr)
      })
    this.server = server

    if (this.service !== undefined) {
      log(
        'service %s.%s%s recorded; no discovery responder is available',
        this.service.name,
        this.service.type,
        this.service.domain,
      )
    }

    server.listen(toListenOptions(this.parameters))
  }

  cancel(): void {
    if (this.cancelRequested) return
    this.cancelRequested = true
    this.accepting = false

    const server = this.server
    if (server?.listening) this.closeServer(server)
    this.transition({ type: 'cancelled' })
  }

  private closeServer(server: Server): void {
    server.close((error) => {
      if (error) log('close on %s reported: %s', this.addr, error.message)
    })
  }

  private onSocket(socket: Socket): void {
    const queue = this.queue
    if (!this.accepting || queue === undefined) {
      socket.destroy()
      log('listener is not accepting, destroying socket')
      return
    }

    log('incoming socket from %s:%s', socket.remoteAddress, socket.remotePort)
    const connection = new TcpConnection(socket)
    queue.async(() => {
      if (this.newConnectionHandler === undefined) {
        connection.cancel()
        return
      }
      this.newConnectionHandler(connection)
    })
  }

  private onListen(server: Server): void {
    const address = server.address()

    if (address == null) {
      this.addr = 'unknown'
    } else if (typeof address === 'string') {
      this.addr = address
    } else {
      this.addr = `${address.address}:${address.port}`
      this.boundPort = address.port
      this.local = addressOf(address.address, address.port)
    }
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
