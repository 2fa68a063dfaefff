import { EventLoop, type EventLoopOptions } from './event-loop'

/** A fixed set of loops handed out round-robin. */
export class EventLoopGroup {
  public readonly loops: readonly EventLoop[]
  private index = 0

  constructor(size = 1, options: EventLoopOptions = {}, label = 'berth-loop') {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`event loop group size must be positive: ${size}`)
    }
    this.loops = Array.from(
      { length: size },
      (_, i) => new EventLoop(`${label}-${i}`, options),
    )
  }

  next(): EventLoop {
    const loop = this.loops[this.index % this.loops.length]
    this.index = (this.index + 1) % this.loops.length
    if (loop === undefined) {
      throw new RangeError('event loop group is empty')
    }
    return loop
  }

  async shutdownGracefully(): Promise<void> {
    await Promise.all(this.loops.map((loop) => loop.shutdownGracefully()))
  }
}
