import type { ListenerPlatform } from '../listener'
import { TcpListener } from './tcp/listener'
import { UdpListener } from './udp/listener'
import type { DatagramSocketFactory } from './udp/types'

export { TcpConnection } from './tcp/connection'
export { TcpListener } from './tcp/listener'
export { DatagramFlow } from './udp/flow'
export { UdpListener } from './udp/listener'
export type {
  DatagramFlowOwner,
  DatagramSocket,
  DatagramSocketFactory,
} from './udp/types'
export * from './utils'

export interface NodePlatformOptions {
  createDatagramSocket?: DatagramSocketFactory
}

/**
 * Listeners backed by `node:net` for stream transports and `node:dgram` for
 * datagram transports.
 */
export function createNodePlatform(
  options: NodePlatformOptions = {},
): ListenerPlatform {
  return {
    capabilities: { listenerIntrospection: true },
    createListener(parameters) {
      switch (parameters.protocol.kind) {
        case 'stream':
          return new TcpListener(parameters)
        case 'datagram':
          return new UdpListener(parameters, options.createDatagramSocket)
      }
    },
  }
}
