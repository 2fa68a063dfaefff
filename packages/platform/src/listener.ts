import type { SocketAddress } from '@berth/utils'
import type { PlatformConnection } from './connection'
import type { DispatchQueue } from './dispatch-queue'
import type { ListenerParameters, ServiceAdvertisement } from './parameters'

/**
 * `setup` is the state before `start` and is never delivered to a
 * `stateUpdateHandler`.
 */
export type ListenerState =
  | { readonly type: 'setup' }
  | { readonly type: 'waiting'; readonly error: Error }
  | { readonly type: 'ready' }
  | { readonly type: 'failed'; readonly error: Error }
  | { readonly type: 'cancelled' }

export type ListenerStateHandler = (state: ListenerState) => void

export type NewConnectionHandler = (connection: PlatformConnection) => void

/**
 * A callback-driven listening primitive. Handlers are invoked on the queue
 * given to `start`; `cancel` is asynchronous and confirmed by a `cancelled`
 * state update.
 */
export interface PlatformListener {
  readonly state: ListenerState
  readonly parameters: ListenerParameters
  /** The bound port, known once the listener is ready. */
  readonly port: number | undefined
  /** The concrete bound address, known once the listener is ready. */
  readonly localAddress: SocketAddress | undefined
  service?: ServiceAdvertisement
  stateUpdateHandler?: ListenerStateHandler
  newConnectionHandler?: NewConnectionHandler
  start(queue: DispatchQueue): void
  cancel(): void
}

export interface PlatformCapabilities {
  /** Whether the live listener handle may be handed out to callers. */
  readonly listenerIntrospection: boolean
}

export interface ListenerPlatform {
  readonly capabilities: PlatformCapabilities
  /** May throw synchronously when the parameters cannot be honoured. */
  createListener(parameters: ListenerParameters): PlatformListener
}
