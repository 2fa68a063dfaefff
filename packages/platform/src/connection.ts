import type { SocketAddress } from '@berth/utils'
import type { DispatchQueue } from './dispatch-queue'
import type { ProtocolOptions } from './protocol-options'

export type ConnectionState =
  | { readonly type: 'setup' }
  | { readonly type: 'preparing' }
  | { readonly type: 'waiting'; readonly error: Error }
  | { readonly type: 'ready' }
  | { readonly type: 'failed'; readonly error: Error }
  | { readonly type: 'cancelled' }

export type ConnectionStateHandler = (state: ConnectionState) => void

/**
 * One accepted connection (a stream socket, or one remote peer of a datagram
 * listener). All handlers run on the queue passed to `start`.
 */
export interface PlatformConnection {
  readonly state: ConnectionState
  readonly localAddress: SocketAddress | undefined
  readonly remoteAddress: SocketAddress | undefined
  stateUpdateHandler?: ConnectionStateHandler
  receiveHandler?: (data: Uint8Array) => void
  endOfStreamHandler?: () => void
  start(queue: DispatchQueue): void
  applyProtocolOptions(protocol: ProtocolOptions): void
  send(data: Uint8Array, completion: (error?: Error) => void): void
  cancel(): void
}
