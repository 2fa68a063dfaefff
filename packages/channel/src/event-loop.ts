import { SerialTaskQueue, toError } from '@berth/utils'
import debug from 'debug'
import { EventLoopShutdownError, InvariantViolationError } from './errors'
import { type ChannelFuture, ChannelPromise, type ChannelResult } from './future'

const log = debug('berth:loop')

export interface EventLoopOptions {
  /**
   * Receives errors thrown by loop tasks, fatal channel errors included.
   * Without it they are rethrown on the next tick.
   */
  onUncaughtError?: (error: unknown) => void
  maxTasksPerTick?: number
}

/**
 * The single owning execution context of a channel. Every state transition
 * of a channel runs as a task here.
 */
export class EventLoop {
  private readonly queue: SerialTaskQueue
  private shuttingDown = false
  private terminated: ChannelFuture<void> | undefined

  constructor(
    public readonly label = 'berth-loop',
    options: EventLoopOptions = {},
  ) {
    this.queue = new SerialTaskQueue(label, {
      onUncaughtError: options.onUncaughtError,
      maxTasksPerTick: options.maxTasksPerTick,
    })
  }

  get inEventLoop(): boolean {
    return this.queue.isDraining
  }

  get isShuttingDown(): boolean {
    return this.shuttingDown
  }

  preconditionInEventLoop(): void {
    if (!this.inEventLoop) {
      throw new InvariantViolationError(
        `must be called on event loop ${this.label}`,
      )
    }
  }

  execute(task: () => void): void {
    if (this.shuttingDown) {
      throw new EventLoopShutdownError(this.label)
    }
    this.queue.enqueue(task)
  }

  /** Run `task` on the loop; a thrown error fails the returned future. */
  submit<T>(task: () => T): ChannelFuture<T> {
    const promise = this.makePromise<T>()
    this.execute(() => {
      let value: T
      try {
        value = task()
      } catch (error) {
        promise.fail(toError(error))
        return
      }
      promise.succeed(value)
    })
    return promise.futureResult
  }

  makePromise<T>(): ChannelPromise<T> {
    return new ChannelPromise<T>(this)
  }

  makeSucceededFuture<T>(value: T): ChannelFuture<T> {
    const promise = this.makePromise<T>()
    promise.succeed(value)
    return promise.futureResult
  }

  makeFailedFuture<T>(error: Error): ChannelFuture<T> {
    const promise = this.makePromise<T>()
    promise.fail(error)
    return promise.futureResult
  }

  makeCompletedFuture<T>(result: ChannelResult<T>): ChannelFuture<T> {
    const promise = this.makePromise<T>()
    promise.completeWith(result)
    return promise.futureResult
  }

  /**
   * Stop accepting tasks. The returned future completes once every task
   * queued before the call has run.
   */
  shutdownGracefully(): ChannelFuture<void> {
    if (this.terminated !== undefined) return this.terminated

    const promise = this.makePromise<void>()
    this.terminated = promise.futureResult
    this.shuttingDown = true
    log('%s shutting down with %d tasks pending', this.label, this.queue.pending)
    this.queue.enqueue(() => {
      log('%s terminated', this.label)
      promise.succeed()
    })
    return promise.futureResult
  }
}
