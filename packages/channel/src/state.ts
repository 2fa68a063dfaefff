import { IOOnClosedChannelError, InappropriateOperationForStateError } from './errors'
import type { ChannelPromise } from './future'

export type ChannelState<A> =
  | { readonly type: 'idle' }
  | {
      readonly type: 'activating'
      readonly promise: ChannelPromise<void> | undefined
    }
  | { readonly type: 'active'; readonly substate: A }
  | { readonly type: 'closed'; readonly reason: Error }

/**
 * idle -> activating -> active -> closed, with closed reachable from every
 * state and absorbing. Only touched on the owning loop.
 */
export class ChannelStateMachine<A> {
  private current: ChannelState<A> = { type: 'idle' }

  get state(): ChannelState<A> {
    return this.current
  }

  get isActive(): boolean {
    return this.current.type === 'active'
  }

  get isClosed(): boolean {
    return this.current.type === 'closed'
  }

  beginActivating(promise?: ChannelPromise<void>): void {
    switch (this.current.type) {
      case 'idle':
        this.current = { type: 'activating', promise }
        return
      case 'closed':
        throw new IOOnClosedChannelError()
      default:
        throw new InappropriateOperationForStateError(
          'begin activating',
          this.current.type,
        )
    }
  }

  /** Returns the promise handed to `beginActivating`. */
  becomeActive(substate: A): ChannelPromise<void> | undefined {
    if (this.current.type !== 'activating') {
      throw new InappropriateOperationForStateError(
        'become active',
        this.current.type,
      )
    }
    const { promise } = this.current
    this.current = { type: 'active', substate }
    return promise
  }

  /** Returns the state closed from, or `undefined` when already closed. */
  close(reason: Error): ChannelState<A> | undefined {
    const previous = this.current
    if (previous.type === 'closed') return undefined
    this.current = { type: 'closed', reason }
    return previous
  }
}
