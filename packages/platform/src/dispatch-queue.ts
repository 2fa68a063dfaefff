import { SerialTaskQueue, type SerialTaskQueueOptions } from '@berth/utils'

/**
 * Serial queue on which a platform primitive delivers its callbacks.
 *
 * Never the same queue as an event loop: code running
 * here must hop to its owner before touching owner state.
 */
export class DispatchQueue {
  private readonly queue: SerialTaskQueue

  constructor(
    public readonly label: string,
    options?: SerialTaskQueueOptions,
  ) {
    this.queue = new SerialTaskQueue(label, options)
  }

  /** Whether the caller is running inside one of this queue's tasks. */
  get isCurrent(): boolean {
    return this.queue.isDraining
  }

  async(task: () => void): void {
    this.queue.enqueue(task)
  }
}
