import {
  cloneProtocolOptions,
  type PlatformConnection,
  StreamProtocolOptions,
} from '@berth/platform'
import type { SynchronousChannelOptions } from '../channel'
import { ConnectionChannel } from '../connection-channel'
import type { EventLoop } from '../event-loop'
import type { ChannelOption } from '../options'
import {
  type ListenerChannelInit,
  StateManagedListenerChannel,
} from './state-managed-listener-channel'

export interface StreamListenerChannelInit
  extends Omit<ListenerChannelInit, 'protocolOptions' | 'childProtocolOptions'> {
  protocolOptions?: StreamProtocolOptions
  childProtocolOptions?: StreamProtocolOptions
}

/** Listener for stream transports; each accepted socket becomes a child. */
export class StreamListenerChannel extends StateManagedListenerChannel {
  private readonly sync: SynchronousChannelOptions

  constructor(init: StreamListenerChannelInit) {
    super({
      ...init,
      label: init.label ?? 'berth.stream-listener',
      protocolOptions: {
        kind: 'stream',
        options: init.protocolOptions ?? new StreamProtocolOptions(),
      },
      childProtocolOptions: {
        kind: 'stream',
        options: init.childProtocolOptions ?? new StreamProtocolOptions(),
      },
    })

    this.sync = {
      getOption: <V>(option: ChannelOption<V>): V => {
        this.assertOptionSupported(option, 'get')
        return this.getOption0(option)
      },
      setOption: <V>(option: ChannelOption<V>, value: V): void => {
        this.assertOptionSupported(option, 'set')
        this.setOption0(option, value)
      },
    }
  }

  override get syncOptions(): SynchronousChannelOptions {
    return this.sync
  }

  protected makeChildChannel(
    connection: PlatformConnection,
    eventLoop: EventLoop,
  ): ConnectionChannel {
    return new ConnectionChannel({
      parent: this,
      eventLoop,
      connection,
      protocolOptions: cloneProtocolOptions(this.childProtocolOptions),
      initializer: this.childChannelInitializer,
      label: `${this.label}.child`,
    })
  }
}
