import { type Endpoint, hostPort, MultipathServiceType, unixPath } from '@berth/platform'
import { z } from 'zod'

const StreamOptionsSchema = z
  .object({
    noDelay: z.boolean().optional(),
    keepAlive: z.boolean().optional(),
    keepAliveIdle: z.number().int().nonnegative().optional(),
  })
  .strict()

const DatagramOptionsSchema = z
  .object({
    receiveBufferSize: z.number().int().positive().optional(),
    sendBufferSize: z.number().int().positive().optional(),
    broadcast: z.boolean().optional(),
    ttl: z.number().int().min(1).max(255).optional(),
  })
  .strict()

const listenerFields = {
  host: z.string().min(1).default('0.0.0.0'),
  port: z.number().int().min(0).max(65535).default(0),
  /** Listen on a unix domain socket instead of `host`/`port`. */
  path: z.string().min(1).optional(),
  reuseAddress: z.boolean().default(false),
  reusePort: z.boolean().default(false),
  allowLocalEndpointReuse: z.boolean().default(false),
  enablePeerToPeer: z.boolean().default(false),
  multipath: z
    .nativeEnum(MultipathServiceType)
    .default(MultipathServiceType.Disabled),
}

export const ListenerConfigSchema = z.discriminatedUnion('transport', [
  z.object({
    transport: z.literal('stream'),
    ...listenerFields,
    stream: StreamOptionsSchema.default({}),
    childStream: StreamOptionsSchema.default({}),
  }),
  z.object({
    transport: z.literal('datagram'),
    ...listenerFields,
    datagram: DatagramOptionsSchema.default({}),
    childDatagram: DatagramOptionsSchema.default({}),
  }),
])

export type ListenerConfig = z.infer<typeof ListenerConfigSchema>
export type ListenerConfigInput = z.input<typeof ListenerConfigSchema>

/** Throws a `ZodError` describing every invalid field. */
export function parseListenerConfig(input: unknown): ListenerConfig {
  return ListenerConfigSchema.parse(input)
}

export function listenerConfigEndpoint(config: ListenerConfig): Endpoint {
  if (config.path !== undefined) {
    return unixPath(config.path)
  }
  return hostPort(config.host, config.port)
}
