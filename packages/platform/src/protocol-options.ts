import { UnsupportedSocketOptionError } from './errors'

export type SocketOptionLevel =
  | 'SOL_SOCKET'
  | 'IPPROTO_TCP'
  | 'IPPROTO_UDP'
  | 'IPPROTO_IP'

export interface SocketOptionKey {
  readonly level: SocketOptionLevel
  readonly name: string
}

export const SocketOptionKeys = {
  SO_REUSEADDR: { level: 'SOL_SOCKET', name: 'SO_REUSEADDR' },
  SO_REUSEPORT: { level: 'SOL_SOCKET', name: 'SO_REUSEPORT' },
  SO_KEEPALIVE: { level: 'SOL_SOCKET', name: 'SO_KEEPALIVE' },
  SO_RCVBUF: { level: 'SOL_SOCKET', name: 'SO_RCVBUF' },
  SO_SNDBUF: { level: 'SOL_SOCKET', name: 'SO_SNDBUF' },
  SO_BROADCAST: { level: 'SOL_SOCKET', name: 'SO_BROADCAST' },
  TCP_NODELAY: { level: 'IPPROTO_TCP', name: 'TCP_NODELAY' },
  TCP_KEEPIDLE: { level: 'IPPROTO_TCP', name: 'TCP_KEEPIDLE' },
  IP_TTL: { level: 'IPPROTO_IP', name: 'IP_TTL' },
} as const satisfies Record<string, SocketOptionKey>

export const socketOptionId = (key: SocketOptionKey): string =>
  `${key.level}/${key.name}`

export const isSameSocketOption = (
  a: SocketOptionKey,
  b: SocketOptionKey,
): boolean => a.level === b.level && a.name === b.name

const requireNonNegative = (key: SocketOptionKey, value: number): number => {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${socketOptionId(key)} must be a non-negative integer`)
  }
  return value
}

export interface StreamProtocolOptionsInit {
  noDelay: boolean
  keepAlive: boolean
  /** Seconds of idleness before the first keep-alive probe; 0 keeps the system default. */
  keepAliveIdle: number
}

/**
 * Stream transport options. Mutable on purpose: the option store writes
 * socket options straight into the instance the listener was built with.
 */
export class StreamProtocolOptions implements StreamProtocolOptionsInit {
  public noDelay: boolean
  public keepAlive: boolean
  public keepAliveIdle: number

  constructor(init: Partial<StreamProtocolOptionsInit> = {}) {
    this.noDelay = init.noDelay ?? false
    this.keepAlive = init.keepAlive ?? false
    this.keepAliveIdle = init.keepAliveIdle ?? 0
  }

  applySocketOption(key: SocketOptionKey, value: number): void {
    switch (socketOptionId(key)) {
      case 'IPPROTO_TCP/TCP_NODELAY':
        this.noDelay = value !== 0
        return
      case 'SOL_SOCKET/SO_KEEPALIVE':
        this.keepAlive = value !== 0
        return
      case 'IPPROTO_TCP/TCP_KEEPIDLE':
        this.keepAliveIdle = requireNonNegative(key, value)
        return
      default:
        throw new UnsupportedSocketOptionError(key.level, key.name)
    }
  }

  valueFor(key: SocketOptionKey): number {
    switch (socketOptionId(key)) {
      case 'IPPROTO_TCP/TCP_NODELAY':
        return this.noDelay ? 1 : 0
      case 'SOL_SOCKET/SO_KEEPALIVE':
        return this.keepAlive ? 1 : 0
      case 'IPPROTO_TCP/TCP_KEEPIDLE':
        return this.keepAliveIdle
      default:
        throw new UnsupportedSocketOptionError(key.level, key.name)
    }
  }

  clone(): StreamProtocolOptions {
    return new StreamProtocolOptions(this)
  }
}

export interface DatagramProtocolOptionsInit {
  receiveBufferSize: number | undefined
  sendBufferSize: number | undefined
  broadcast: boolean
  ttl: number | undefined
}

export class DatagramProtocolOptions implements DatagramProtocolOptionsInit {
  public receiveBufferSize: number | undefined
  public sendBufferSize: number | undefined
  public broadcast: boolean
  public ttl: number | undefined

  constructor(init: Partial<DatagramProtocolOptionsInit> = {}) {
    this.receiveBufferSize = init.receiveBufferSize
    this.sendBufferSize = init.sendBufferSize
    this.broadcast = init.broadcast ?? false
    this.ttl = init.ttl
  }

  applySocketOption(key: SocketOptionKey, value: number): void {
    switch (socketOptionId(key)) {
      case 'SOL_SOCKET/SO_RCVBUF':
        this.receiveBufferSize = requireNonNegative(key, value)
        return
      case 'SOL_SOCKET/SO_SNDBUF':
        this.sendBufferSize = requireNonNegative(key, value)
        return
      case 'SOL_SOCKET/SO_BROADCAST':
        this.broadcast = value !== 0
        return
      case 'IPPROTO_IP/IP_TTL':
        if (value < 1 || value > 255) {
          throw new RangeError('IPPROTO_IP/IP_TTL must be between 1 and 255')
        }
        this.ttl = value
        return
      default:
        throw new UnsupportedSocketOptionError(key.level, key.name)
    }
  }

  /** Unset sizes and TTL read back as 0, the "system default" value. */
  valueFor(key: SocketOptionKey): number {
    switch (socketOptionId(key)) {
      case 'SOL_SOCKET/SO_RCVBUF':
        return this.receiveBufferSize ?? 0
      case 'SOL_SOCKET/SO_SNDBUF':
        return this.sendBufferSize ?? 0
      case 'SOL_SOCKET/SO_BROADCAST':
        return this.broadcast ? 1 : 0
      case 'IPPROTO_IP/IP_TTL':
        return this.ttl ?? 0
      default:
        throw new UnsupportedSocketOptionError(key.level, key.name)
    }
  }

  clone(): DatagramProtocolOptions {
    return new DatagramProtocolOptions(this)
  }
}

export type ProtocolOptions =
  | { readonly kind: 'stream'; readonly options: StreamProtocolOptions }
  | { readonly kind: 'datagram'; readonly options: DatagramProtocolOptions }

export type TransportKind = ProtocolOptions['kind']

export const streamProtocol = (
  init?: Partial<StreamProtocolOptionsInit>,
): ProtocolOptions => ({
  kind: 'stream',
  options: new StreamProtocolOptions(init),
})

export const datagramProtocol = (
  init?: Partial<DatagramProtocolOptionsInit>,
): ProtocolOptions => ({
  kind: 'datagram',
  options: new DatagramProtocolOptions(init),
})

export function defaultProtocolOptions(kind: TransportKind): ProtocolOptions {
  switch (kind) {
    case 'stream':
      return streamProtocol()
    case 'datagram':
      return datagramProtocol()
  }
}

export function cloneProtocolOptions(protocol: ProtocolOptions): ProtocolOptions {
  switch (protocol.kind) {
    case 'stream':
      return { kind: 'stream', options: protocol.options.clone() }
    case 'datagram':
      return { kind: 'datagram', options: protocol.options.clone() }
  }
}

/** Forward a socket option to the bag selected by the transport tag. */
export function applyProtocolSocketOption(
  protocol: ProtocolOptions,
  key: SocketOptionKey,
  value: number,
): void {
  switch (protocol.kind) {
    case 'stream':
      protocol.options.applySocketOption(key, value)
      return
    case 'datagram':
      protocol.options.applySocketOption(key, value)
      return
  }
}

export function protocolSocketOptionValue(
  protocol: ProtocolOptions,
  key: SocketOptionKey,
): number {
  switch (protocol.kind) {
    case 'stream':
      return protocol.options.valueFor(key)
    case 'datagram':
      return protocol.options.valueFor(key)
  }
}
