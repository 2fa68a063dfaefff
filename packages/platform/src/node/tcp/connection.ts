import type { Socket } from 'node:net'
import type { SocketAddress } from '@berth/utils'
import debug from 'debug'
import type { ConnectionState, PlatformConnection } from '../../connection'
import type { DispatchQueue } from '../../dispatch-queue'
import { InvalidParametersError, ListenerStateError } from '../../errors'
import type { ProtocolOptions } from '../../protocol-options'
import { addressOf } from '../utils'

const log = debug('berth:platform:tcp:connection')

export class TcpConnection implements PlatformConnection {
  public stateUpdateHandler?: (state: ConnectionState) => void
  public receiveHandler?: (data: Uint8Array) => void
  public endOfStreamHandler?: () => void

  private current: ConnectionState = { type: 'setup' }
  private queue: DispatchQueue | undefined
  private cancelRequested = false

  constructor(private readonly socket: Socket) {}

  get state(): ConnectionState {
    return this.current
  }

  get localAddress(): SocketAddress | undefined {
    return addressOf(this.socket.localAddress, this.socket.localPort)
  }

  get remoteAddress(): SocketAddress | undefined {
    return addressOf(this.socket.remoteAddress, this.socket.remotePort)
  }

  start(queue: DispatchQueue): void {
    if (this.queue !== undefined) {
      throw new ListenerStateError('connection already started')
    }
    this.queue = queue

    this.socket
      .on('data', (chunk: Buffer) => {
        queue.async(() => this.receiveHandler?.(chunk))
      })
      .on('end', () => {
        queue.async(() => this.endOfStreamHandler?.())
      })
      .on('error', (error) => {
        log('socket error: %s', error.message)
        this.transition({ type: 'failed', error })
      })
      .on('close', () => {
        if (!this.cancelRequested) this.transition({ type: 'cancelled' })
      })

    this.transition({ type: 'ready' })
  }

  applyProtocolOptions(protocol: ProtocolOptions): void {
    if (protocol.kind !== 'stream') {
      throw new InvalidParametersError(
        'tcp connections take stream protocol options',
        { kind: protocol.kind },
      )
    }
    const { noDelay, keepAlive, keepAliveIdle } = protocol.options
    this.socket.setNoDelay(noDelay)
    this.socket.setKeepAlive(keepAlive, keepAliveIdle * 1000)
  }

  send(data: Uint8Array, completion: (error?: Error) => void): void {
    const queue = this.queue
    if (queue === undefined) {
      throw new ListenerStateError('connection not started')
    }
    this.socket.write(data, (error) => {
      queue.async(() => completion(error ?? undefined))
    })
  }

  cancel(): void {
    if (this.cancelRequested) return
    this.cancelRequested = true
    this.socket.destroy()
    this.transition({ type: 'cancelled' })
  }

  private transition(next: ConnectionState): void {
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
