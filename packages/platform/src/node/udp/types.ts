import type { RemoteInfo, SocketOptions } from 'node:dgram'
import type { AddressInfo } from 'node:net'

/**
 * The slice of `dgram.Socket` the datagram listener relies on. Tests pass
 * an in-process stand-in through `DatagramSocketFactory`.
 */
export interface DatagramSocket {
  bind(port?: number, address?: string, callback?: () => void): unknown
  close(callback?: () => void): unknown
  send(
    msg: Uint8Array,
    port: number,
    address: string,
    callback?: (error: Error | null) => void,
  ): void
  address(): AddressInfo
  setBroadcast(flag: boolean): void
  setTTL(ttl: number): number
  on(event: 'message', listener: (msg: Buffer, rinfo: RemoteInfo) => void): unknown
  on(event: 'listening', listener: () => void): unknown
  on(event: 'error', listener: (error: Error) => void): unknown
}

export type DatagramSocketFactory = (options: SocketOptions) => DatagramSocket

/** What a flow needs from the listener that owns the shared socket. */
export interface DatagramFlowOwner {
  sendTo(
    data: Uint8Array,
    host: string,
    port: number,
    completion: (error?: Error) => void,
  ): void
  release(key: string): void
}
