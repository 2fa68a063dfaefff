import type { Multiaddr } from '@multiformats/multiaddr'
import {
  inetSocketAddress,
  type SocketAddress,
  socketAddressFromMultiaddr,
  unixSocketAddress,
} from '@berth/utils'

export interface HostPortEndpoint {
  readonly type: 'hostPort'
  readonly host: string
  readonly port: number
}

export interface UnixEndpoint {
  readonly type: 'unix'
  readonly path: string
}

/**
 * A service to advertise rather than a concrete address. The platform picks
 * the address; `interface` optionally pins the network interface.
 */
export interface ServiceEndpoint {
  readonly type: 'service'
  readonly name: string
  readonly serviceType: string
  readonly domain: string
  readonly interface?: string
}

export type LocalEndpoint = HostPortEndpoint | UnixEndpoint

export type Endpoint = LocalEndpoint | ServiceEndpoint

export const hostPort = (host: string, port: number): HostPortEndpoint => ({
  type: 'hostPort',
  host,
  port,
})

export const unixPath = (path: string): UnixEndpoint => ({ type: 'unix', path })

export const service = (
  name: string,
  serviceType: string,
  domain = 'local.',
  iface?: string,
): ServiceEndpoint => ({
  type: 'service',
  name,
  serviceType,
  domain,
  interface: iface,
})

export function endpointFromMultiaddr(ma: Multiaddr): LocalEndpoint {
  const address = socketAddressFromMultiaddr(ma)
  switch (address.type) {
    case 'unix':
      return unixPath(address.path)
    case 'inet':
      return hostPort(address.host, address.port)
  }
}

/**
 * Convert a concrete endpoint into an address. Throws `InvalidAddressError`
 * for host names, which carry no address until resolved.
 */
export function endpointToSocketAddress(endpoint: LocalEndpoint): SocketAddress {
  switch (endpoint.type) {
    case 'unix':
      return unixSocketAddress(endpoint.path)
    case 'hostPort':
      return inetSocketAddress(endpoint.host, endpoint.port)
  }
}
