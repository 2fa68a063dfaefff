import { multiaddr } from '@multiformats/multiaddr'
import { InvalidAddressError } from '@berth/utils'
import { describe, expect, it } from 'vitest'
import {
  endpointFromMultiaddr,
  endpointToSocketAddress,
  hostPort,
  service,
} from '../../src'

describe('endpoints', () => {
  it('should build a host/port endpoint from a multiaddr', () => {
    expect(endpointFromMultiaddr(multiaddr('/ip4/0.0.0.0/tcp/0'))).toEqual({
      type: 'hostPort',
      host: '0.0.0.0',
      port: 0,
    })
  })

  it('should convert IP endpoints to socket addresses', () => {
    expect(endpointToSocketAddress(hostPort('127.0.0.1', 8080))).toEqual({
      type: 'inet',
      family: 4,
      host: '127.0.0.1',
      port: 8080,
    })
  })

  it('should refuse to convert host names', () => {
    expect(() => endpointToSocketAddress(hostPort('localhost', 80))).toThrow(
      InvalidAddressError,
    )
  })

  it('should default services to the local domain', () => {
    expect(service('printer', '_ipp._tcp')).toEqual({
      type: 'service',
      name: 'printer',
      serviceType: '_ipp._tcp',
      domain: 'local.',
      interface: undefined,
    })
  })
})
