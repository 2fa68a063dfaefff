import type { SocketAddress } from '@berth/utils'
import { InvariantViolationError } from './errors'

export interface AddressSnapshot {
  readonly local?: SocketAddress
  readonly remote?: SocketAddress
}

const EMPTY: AddressSnapshot = Object.freeze({})

/**
 * Addresses readable from anywhere without hopping onto the loop. The
 * snapshot is frozen and swapped whole, once.
 */
export class AddressCache {
  private snapshot: AddressSnapshot = EMPTY
  private written = false

  get current(): AddressSnapshot {
    return this.snapshot
  }

  get local(): SocketAddress | undefined {
    return this.snapshot.local
  }

  get remote(): SocketAddress | undefined {
    return this.snapshot.remote
  }

  store(snapshot: AddressSnapshot): void {
    if (this.written) {
      throw new InvariantViolationError('address cache written twice')
    }
    this.written = true
    this.snapshot = Object.freeze({ ...snapshot })
  }
}
