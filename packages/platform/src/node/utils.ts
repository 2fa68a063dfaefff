import type { ListenOptions, ServerOpts } from 'node:net'
import type { SocketOptions } from 'node:dgram'
import {
  inetSocketAddress,
  type InetSocketAddress,
  isIPv4,
  isIPv6,
} from '@berth/utils'
import type { ListenerParameters } from '../parameters'
import type {
  DatagramProtocolOptions,
  StreamProtocolOptions,
} from '../protocol-options'

/**
 * Net listen options for the parameters' required endpoint. Endpoint reuse
 * maps onto a shareable (non-exclusive) handle, the closest Node.js offers.
 */
export function toListenOptions(parameters: ListenerParameters): ListenOptions {
  const endpoint = parameters.requiredLocalEndpoint
  const exclusive = !parameters.allowLocalEndpointReuse

  if (endpoint?.type === 'unix') {
    return { path: endpoint.path, exclusive }
  }

  if (endpoint?.type === 'hostPort') {
    return {
      host: endpoint.host,
      port: endpoint.port,
      ipv6Only: isIPv6(endpoint.host),
      exclusive,
    }
  }

  // service listeners take whatever port the system hands out
  return { port: 0, exclusive }
}

export function toServerOptions(stream: StreamProtocolOptions): ServerOpts {
  return {
    noDelay: stream.noDelay,
    keepAlive: stream.keepAlive,
    keepAliveInitialDelay: stream.keepAliveIdle * 1000,
  }
}

export function toDatagramSocketOptions(
  parameters: ListenerParameters,
  datagram: DatagramProtocolOptions,
): SocketOptions {
  const endpoint = parameters.requiredLocalEndpoint
  const type =
    endpoint?.type === 'hostPort' && isIPv6(endpoint.host) ? 'udp6' : 'udp4'

  return {
    type,
    reuseAddr: parameters.allowLocalEndpointReuse,
    recvBufferSize: datagram.receiveBufferSize,
    sendBufferSize: datagram.sendBufferSize,
  }
}

export function addressOf(
  host: string | undefined,
  port: number | undefined,
): InetSocketAddress | undefined {
  if (host === undefined || port === undefined) return undefined
  if (!isIPv4(host) && !isIPv6(host)) return undefined
  return inetSocketAddress(host, port)
}
