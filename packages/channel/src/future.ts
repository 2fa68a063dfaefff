import { toError } from '@berth/utils'
import { PromiseAlreadyCompletedError } from './errors'
import type { EventLoop } from './event-loop'

export type ChannelResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: Error }

type Listener<T> = (result: ChannelResult<T>) => void

/** Run `body`, capturing a throw as a failed result. */
export function resultOf<T>(body: () => T): ChannelResult<T> {
  try {
    return { ok: true, value: body() }
  } catch (error) {
    return { ok: false, error: toError(error) }
  }
}

/**
 * The read side of a `ChannelPromise`. Callbacks registered with the
 * `when*` methods always run on the future's event loop: inline when the
 * future completes there, otherwise as a task on it.
 *
 * A native promise is only created when the future is awaited, so a failed
 * future nobody awaits never becomes an unhandled rejection.
 */
export class ChannelFuture<T> implements PromiseLike<T> {
  private result: ChannelResult<T> | undefined
  private listeners: Listener<T>[] = []

  constructor(public readonly eventLoop: EventLoop) {}

  get isDone(): boolean {
    return this.result !== undefined
  }

  /** The result, if the future has completed. */
  peek(): ChannelResult<T> | undefined {
    return this.result
  }

  whenComplete(callback: (result: ChannelResult<T>) => void): void {
    this.subscribe((result) => this.onLoop(() => callback(result)))
  }

  whenSuccess(callback: (value: T) => void): void {
    this.whenComplete((result) => {
      if (result.ok) callback(result.value)
    })
  }

  whenFailure(callback: (error: Error) => void): void {
    this.whenComplete((result) => {
      if (!result.ok) callback(result.error)
    })
  }

  then<R1 = T, R2 = never>(
    onfulfilled?: ((value: T) => R1 | PromiseLike<R1>) | null,
    onrejected?: ((reason: unknown) => R2 | PromiseLike<R2>) | null,
  ): Promise<R1 | R2> {
    const settled = new Promise<T>((resolve, reject) => {
      this.subscribe((result) => {
        if (result.ok) {
          resolve(result.value)
        } else {
          reject(result.error)
        }
      })
    })
    return settled.then(onfulfilled, onrejected)
  }

  /** @internal */
  complete(result: ChannelResult<T>): void {
    if (this.result !== undefined) {
      throw new PromiseAlreadyCompletedError()
    }
    this.result = result

    const listeners = this.listeners
    this.listeners = []
    for (const listener of listeners) {
      listener(result)
    }
  }

  private subscribe(listener: Listener<T>): void {
    if (this.result !== undefined) {
      listener(this.result)
      return
    }
    this.listeners.push(listener)
  }

  private onLoop(task: () => void): void {
    if (this.eventLoop.inEventLoop) {
      task()
    } else {
      this.eventLoop.execute(task)
    }
  }
}

/**
 * Write side of a single-assignment result. Completing it twice throws
 * `PromiseAlreadyCompletedError`.
 */
export class ChannelPromise<T> {
  public readonly futureResult: ChannelFuture<T>

  constructor(eventLoop: EventLoop) {
    this.futureResult = new ChannelFuture<T>(eventLoop)
  }

  get eventLoop(): EventLoop {
    return this.futureResult.eventLoop
  }

  succeed(value: T): void {
    this.futureResult.complete({ ok: true, value })
  }

  fail(error: Error): void {
    this.futureResult.complete({ ok: false, error })
  }

  completeWith(result: ChannelResult<T>): void {
    this.futureResult.complete(result)
  }

  /** Complete this promise with whatever `future` completes with. */
  completeWithFuture(future: ChannelFuture<T>): void {
    future.whenComplete((result) => this.completeWith(result))
  }
}
