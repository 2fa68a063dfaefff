import {
  MultipathServiceType,
  type PlatformListener,
  type SocketOptionKey,
  SocketOptionKeys,
  socketOptionId,
} from '@berth/platform'
import { z } from 'zod'

export type ChannelOptionKind =
  | 'autoRead'
  | 'socket'
  | 'enablePeerToPeer'
  | 'allowLocalEndpointReuse'
  | 'multipathServiceType'
  | 'listener'
  | 'allowRemoteHalfClosure'
  | 'connectTimeout'

/**
 * A typed channel option. The value schema checks values crossing the
 * option store, in both directions.
 */
export class ChannelOption<V> {
  constructor(
    public readonly kind: ChannelOptionKind,
    public readonly schema: z.ZodType<V>,
    public readonly socket?: SocketOptionKey,
  ) {}

  get name(): string {
    return this.socket === undefined ? this.kind : socketOptionId(this.socket)
  }
}

export const SocketOptionValueSchema = z.number().int()

const listenerHandle = z.custom<PlatformListener>(
  (value) => typeof value === 'object' && value !== null,
  { message: 'expected a platform listener' },
)

export const socketOption = (key: SocketOptionKey): ChannelOption<number> =>
  new ChannelOption('socket', SocketOptionValueSchema, key)

export const ChannelOptions = {
  /** Must stay `true` on every channel in this package. */
  autoRead: new ChannelOption('autoRead', z.boolean()),
  reuseAddress: socketOption(SocketOptionKeys.SO_REUSEADDR),
  reusePort: socketOption(SocketOptionKeys.SO_REUSEPORT),
  socketOption,
  enablePeerToPeer: new ChannelOption('enablePeerToPeer', z.boolean()),
  allowLocalEndpointReuse: new ChannelOption(
    'allowLocalEndpointReuse',
    z.boolean(),
  ),
  multipathServiceType: new ChannelOption(
    'multipathServiceType',
    z.nativeEnum(MultipathServiceType),
  ),
  /** Read-only view of the live platform listener, where the platform allows it. */
  listener: new ChannelOption('listener', listenerHandle.optional()),
  /** Connection-level options; listeners reject them. */
  allowRemoteHalfClosure: new ChannelOption(
    'allowRemoteHalfClosure',
    z.boolean(),
  ),
  connectTimeout: new ChannelOption('connectTimeout', z.number().nonnegative()),
} as const
