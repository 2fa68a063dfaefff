import {
  cloneProtocolOptions,
  DatagramProtocolOptions,
  type PlatformConnection,
} from '@berth/platform'
import debug from 'debug'
import { ConnectionChannel } from '../connection-channel'
import type { EventLoop } from '../event-loop'
import {
  type ListenerChannelInit,
  StateManagedListenerChannel,
} from './state-managed-listener-channel'

const log = debug('berth:channel:listener:datagram')

export interface DatagramListenerChannelInit
  extends Omit<ListenerChannelInit, 'protocolOptions' | 'childProtocolOptions'> {
  protocolOptions?: DatagramProtocolOptions
  childProtocolOptions?: DatagramProtocolOptions
}

/**
 * Listener for datagram transports. The platform reports every new remote
 * peer as a connection; each one becomes a child channel.
 */
export class DatagramListenerChannel extends StateManagedListenerChannel {
  constructor(init: DatagramListenerChannelInit) {
    super({
      ...init,
      label: init.label ?? 'berth.datagram-listener',
      protocolOptions: {
        kind: 'datagram',
        options: init.protocolOptions ?? new DatagramProtocolOptions(),
      },
      childProtocolOptions: {
        kind: 'datagram',
        options: init.childProtocolOptions ?? new DatagramProtocolOptions(),
      },
    })
  }

  protected makeChildChannel(
    connection: PlatformConnection,
    eventLoop: EventLoop,
  ): ConnectionChannel {
    log('%s new flow from %o', this.label, connection.remoteAddress)
    return new ConnectionChannel({
      parent: this,
      eventLoop,
      connection,
      protocolOptions: cloneProtocolOptions(this.childProtocolOptions),
      initializer: this.childChannelInitializer,
      label: `${this.label}.flow`,
    })
  }
}
