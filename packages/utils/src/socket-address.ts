import { type Multiaddr, multiaddr } from '@multiformats/multiaddr'
import { InvalidAddressError } from './errors'

export interface InetSocketAddress {
  readonly type: 'inet'
  readonly family: 4 | 6
  readonly host: string
  readonly port: number
}

export interface UnixSocketAddress {
  readonly type: 'unix'
  readonly path: string
}

export type SocketAddress = InetSocketAddress | UnixSocketAddress

export type TransportProtocol = 'tcp' | 'udp'

const ipv4Regex = /^(\d{1,3}\.){3,3}\d{1,3}$/
const ipv6Regex =
  /^(::)?(((\d{1,3}\.){3}(\d{1,3}){1})?([0-9a-f]){0,4}:{0,2}){1,8}(::)?$/i

export const isIPv4 = (ip: string): boolean => {
  return ipv4Regex.test(ip)
}

/** IPv4 literals also satisfy the IPv6 pattern, so they are excluded first. */
export const isIPv6 = (ip: string): boolean => {
  return !ipv4Regex.test(ip) && ipv6Regex.test(ip)
}

const isValidPort = (port: number): boolean =>
  Number.isInteger(port) && port >= 0 && port <= 65535

/**
 * Build an address from an IP literal and a port. Host names are rejected:
 * resolving them is the platform's business, not the address model's.
 */
export function inetSocketAddress(
  host: string,
  port: number | string,
): InetSocketAddress {
  if (typeof port === 'string') {
    port = Number.parseInt(port, 10)
  }

  if (!isValidPort(port)) {
    throw new InvalidAddressError(`invalid port provided: ${port}`, { host })
  }

  if (isIPv4(host)) {
    return { type: 'inet', family: 4, host, port }
  }

  if (isIPv6(host)) {
    return { type: 'inet', family: 6, host, port }
  }

  throw new InvalidAddressError(`not an IP literal: ${host}`, { host, port })
}

export function unixSocketAddress(path: string): UnixSocketAddress {
  if (path.length === 0) {
    throw new InvalidAddressError('unix socket path must not be empty')
  }
  return { type: 'unix', path }
}

export function withPort(
  address: InetSocketAddress,
  port: number,
): InetSocketAddress {
  if (!isValidPort(port)) {
    throw new InvalidAddressError(`invalid port provided: ${port}`, {
      host: address.host,
    })
  }
  return { ...address, port }
}

export function formatSocketAddress(address: SocketAddress): string {
  switch (address.type) {
    case 'unix':
      return address.path
    case 'inet':
      return address.family === 6
        ? `[${address.host}]:${address.port}`
        : `${address.host}:${address.port}`
  }
}

export function socketAddressToMultiaddr(
  address: SocketAddress,
  transport: TransportProtocol = 'tcp',
): Multiaddr {
  switch (address.type) {
    case 'unix':
      return multiaddr(
        `/unix${address.path.startsWith('/') ? '' : '/'}${address.path}`,
      )
    case 'inet':
      return multiaddr(
        `/ip${address.family}/${address.host}/${transport}/${address.port}`,
      )
  }
}

export function socketAddressFromMultiaddr(ma: Multiaddr): SocketAddress {
  if (ma.protoNames().includes('unix')) {
    const path = ma.getPath()
    if (path == null) {
      throw new InvalidAddressError(`Multiaddr ${ma} was not a Unix address`)
    }
    return unixSocketAddress(path)
  }

  const options = ma.toOptions()
  return inetSocketAddress(options.host, options.port)
}
