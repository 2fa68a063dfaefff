import type { Endpoint } from '@berth/platform'
import type { SocketAddress } from '@berth/utils'
import type { EventLoop } from './event-loop'
import type { ChannelFuture } from './future'
import type { ChannelOption } from './options'
import type { ChannelPipeline } from './pipeline'

export type CloseMode = 'all' | 'input' | 'output'

export interface BindToEndpointEvent {
  readonly type: 'bindToEndpoint'
  readonly endpoint: Endpoint
}

export interface CustomOutboundEvent {
  readonly type: 'custom'
  readonly name: string
  readonly payload?: unknown
}

export type OutboundUserEvent = BindToEndpointEvent | CustomOutboundEvent

export const bindToEndpoint = (endpoint: Endpoint): BindToEndpointEvent => ({
  type: 'bindToEndpoint',
  endpoint,
})

/**
 * Synchronous option access for callers already on the channel's loop.
 * Both methods throw when called anywhere else.
 */
export interface SynchronousChannelOptions {
  getOption<V>(option: ChannelOption<V>): V
  setOption<V>(option: ChannelOption<V>, value: V): void
}

export interface Channel {
  readonly eventLoop: EventLoop
  readonly pipeline: ChannelPipeline
  readonly parent: Channel | undefined
  readonly closeFuture: ChannelFuture<void>
  readonly isActive: boolean
  readonly isWritable: boolean
  readonly localAddress: SocketAddress | undefined
  readonly remoteAddress: SocketAddress | undefined
  readonly syncOptions: SynchronousChannelOptions | undefined

  setOption<V>(option: ChannelOption<V>, value: V): ChannelFuture<void>
  getOption<V>(option: ChannelOption<V>): ChannelFuture<V>
  write(data: Uint8Array): ChannelFuture<void>
  flush(): void
  read(): void
  close(mode?: CloseMode): ChannelFuture<void>
  triggerUserOutboundEvent(event: OutboundUserEvent): ChannelFuture<void>
}
