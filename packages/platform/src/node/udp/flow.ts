import type { InetSocketAddress, SocketAddress } from '@berth/utils'
import type { ConnectionState, PlatformConnection } from '../../connection'
import type { DispatchQueue } from '../../dispatch-queue'
import { InvalidParametersError, ListenerStateError } from '../../errors'
import type { ProtocolOptions } from '../../protocol-options'
import type { DatagramFlowOwner } from './types'

/**
 * One remote peer of a datagram listener. Datagrams that arrive before the
 * flow is started are held and replayed, in order, on start.
 */
export class DatagramFlow implements PlatformConnection {
  public stateUpdateHandler?: (state: ConnectionState) => void
  public receiveHandler?: (data: Uint8Array) => void
  public endOfStreamHandler?: () => void

  private current: ConnectionState = { type: 'setup' }
  private queue: DispatchQueue | undefined
  private held: Uint8Array[] = []
  private cancelRequested = false

  constructor(
    private readonly owner: DatagramFlowOwner,
    public readonly key: string,
    public readonly remoteAddress: InetSocketAddress,
    public readonly localAddress: SocketAddress | undefined,
  ) {}

  get state(): ConnectionState {
    return this.current
  }

  start(queue: DispatchQueue): void {
    if (this.queue !== undefined) {
      throw new ListenerStateError('flow already started')
    }
    this.queue = queue
    this.transition({ type: 'ready' })

    const held = this.held
    this.held = []
    for (const data of held) {
      this.deliver(data)
    }
  }

  deliver(data: Uint8Array): void {
    if (this.cancelRequested) return
    const queue = this.queue
    if (queue === undefined) {
      this.held.push(data)
      return
    }
    queue.async(() => this.receiveHandler?.(data))
  }

  /** Per-flow options cannot diverge from the shared socket; only the tag is checked. */
  applyProtocolOptions(protocol: ProtocolOptions): void {
    if (protocol.kind !== 'datagram') {
      throw new InvalidParametersError(
        'datagram flows take datagram protocol options',
        { kind: protocol.kind },
      )
    }
  }

  send(data: Uint8Array, completion: (error?: Error) => void): void {
    const queue = this.queue
    if (queue === undefined) {
      throw new ListenerStateError('flow not started')
    }
    this.owner.sendTo(
      data,
      this.remoteAddress.host,
      this.remoteAddress.port,
      (error) => queue.async(() => completion(error)),
    )
  }

  /** The owning socket failed; the flow cannot outlive it. */
  fail(error: Error): void {
    this.transition({ type: 'failed', error })
  }

  cancel(): void {
    if (this.cancelRequested) return
    this.cancelRequested = true
    this.held = []
    this.owner.release(this.key)
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
