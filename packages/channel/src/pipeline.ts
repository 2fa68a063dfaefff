import debug from 'debug'
import { EventEmitter } from 'eventemitter3'

const log = debug('berth:channel:pipeline')

export interface ChannelPipelineEvent {
  active: []
  inactive: []
  read: [data: unknown]
  error: [error: Error]
}

/**
 * The lifecycle callbacks a channel drives. Handler composition is left to
 * whoever listens on `events`.
 */
export class ChannelPipeline {
  public readonly events: EventEmitter<ChannelPipelineEvent>

  constructor(public readonly label: string) {
    this.events = new EventEmitter<ChannelPipelineEvent>()
  }

  fireChannelActive(): void {
    log('%s active', this.label)
    this.events.emit('active')
  }

  fireChannelInactive(): void {
    log('%s inactive', this.label)
    this.events.emit('inactive')
  }

  fireChannelRead(data: unknown): void {
    this.events.emit('read', data)
  }

  fireErrorCaught(error: Error): void {
    log('%s error caught: %s', this.label, error.message)
    this.events.emit('error', error)
  }
}
