import debug from 'debug'

const log = debug('berth:task-queue')

export type Task = () => void

export interface SerialTaskQueueOptions {
  /**
   * Receives errors thrown by tasks. Without it the error is rethrown on the
   * next tick, which takes the process down like any uncaught exception.
   */
  onUncaughtError?: (error: unknown) => void
  /** Tasks run per macrotask turn before yielding to I/O. */
  maxTasksPerTick?: number
}

/**
 * A FIFO queue of synchronous tasks drained on `setImmediate`.
 *
 * Tasks never run on the caller's stack. `isDraining` is true exactly while
 * one of this queue's tasks is executing, which is what "running on this
 * context" means for anything built on top of the queue.
 */
export class SerialTaskQueue {
  private readonly tasks: Task[] = []
  private readonly maxTasksPerTick: number
  private draining = false
  private scheduled = false

  constructor(
    public readonly label: string,
    private readonly options: SerialTaskQueueOptions = {},
  ) {
    this.maxTasksPerTick = options.maxTasksPerTick ?? 1024
  }

  get isDraining(): boolean {
    return this.draining
  }

  get pending(): number {
    return this.tasks.length
  }

  enqueue(task: Task): void {
    this.tasks.push(task)
    this.schedule()
  }

  private schedule(): void {
    if (this.scheduled || this.draining) return
    this.scheduled = true
    setImmediate(() => this.drain())
  }

  private drain(): void {
    this.scheduled = false
    this.draining = true
    let executed = 0

    try {
      while (executed < this.maxTasksPerTick) {
        const task = this.tasks.shift()
        if (task === undefined) break
        executed++

        try {
          task()
        } catch (error) {
          this.report(error)
        }
      }
    } finally {
      this.draining = false
    }

    if (this.tasks.length > 0) {
      log('%s yielding with %d tasks pending', this.label, this.tasks.length)
      this.schedule()
    }
  }

  private report(error: unknown): void {
    log('%s task threw: %o', this.label, error)
    const handler = this.options.onUncaughtError
    if (handler !== undefined) {
      handler(error)
      return
    }
    process.nextTick(() => {
      throw error
    })
  }
}
