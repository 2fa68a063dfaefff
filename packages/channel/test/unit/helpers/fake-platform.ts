import type {
  ConnectionState,
  DispatchQueue,
  ListenerParameters,
  ListenerPlatform,
  ListenerState,
  PlatformCapabilities,
  PlatformConnection,
  PlatformListener,
  ProtocolOptions,
  ServiceAdvertisement,
} from '@berth/platform'
import { inetSocketAddress, type SocketAddress } from '@berth/utils'

const encoder = new TextEncoder()
const decoder = new TextDecoder()

function requireQueue(queue: DispatchQueue | undefined): DispatchQueue {
  if (queue === undefined) throw new Error('not started')
  return queue
}

/** Every notification is delivered on the start queue, like a real platform. */
export class FakeConnection implements PlatformConnection {
  public state: ConnectionState = { type: 'setup' }
  public stateUpdateHandler?: (state: ConnectionState) => void
  public receiveHandler?: (data: Uint8Array) => void
  public endOfStreamHandler?: () => void

  public queue: DispatchQueue | undefined
  public readonly applied: ProtocolOptions[] = []
  public readonly sent: string[] = []
  public cancelled = false

  constructor(
    public readonly remoteAddress: SocketAddress | undefined = inetSocketAddress(
      '10.0.0.2',
      5000,
    ),
    public readonly localAddress: SocketAddress | undefined = inetSocketAddress(
      '127.0.0.1',
      54321,
    ),
  ) {}

  start(queue: DispatchQueue): void {
    this.queue = queue
    this.notify({ type: 'ready' })
  }

  notify(state: ConnectionState): void {
    requireQueue(this.queue).async(() => {
      this.state = state
      this.stateUpdateHandler?.(state)
    })
  }

  receive(text: string): void {
    const data = encoder.encode(text)
    requireQueue(this.queue).async(() => this.receiveHandler?.(data))
  }

  endOfStream(): void {
    requireQueue(this.queue).async(() => this.endOfStreamHandler?.())
  }

  applyProtocolOptions(protocol: ProtocolOptions): void {
    this.applied.push(protocol)
  }

  send(data: Uint8Array, completion: (error?: Error) => void): void {
    this.sent.push(decoder.decode(data))
    requireQueue(this.queue).async(() => completion())
  }

  cancel(): void {
    if (this.cancelled) return
    this.cancelled = true
    if (this.queue !== undefined) this.notify({ type: 'cancelled' })
  }
}

export class FakeListener implements PlatformListener {
  public state: ListenerState = { type: 'setup' }
  public port: number | undefined
  public localAddress: SocketAddress | undefined
  public service?: ServiceAdvertisement
  public stateUpdateHandler?: (state: ListenerState) => void
  public newConnectionHandler?: (connection: PlatformConnection) => void

  public queue: DispatchQueue | undefined
  public startCount = 0
  public cancelCount = 0

  constructor(
    public readonly parameters: ListenerParameters,
    private readonly confirmCancel = true,
  ) {}

  start(queue: DispatchQueue): void {
    this.startCount++
    this.queue = queue
  }

  notify(state: ListenerState, port?: number): void {
    requireQueue(this.queue).async(() => {
      if (port !== undefined) this.port = port
      this.state = state
      this.stateUpdateHandler?.(state)
    })
  }

  accept(connection: PlatformConnection): void {
    requireQueue(this.queue).async(() => this.newConnectionHandler?.(connection))
  }

  cancel(): void {
    this.cancelCount++
    if (this.confirmCancel) this.confirmCancellation()
  }

  confirmCancellation(): void {
    if (this.queue === undefined) {
      this.state = { type: 'cancelled' }
      return
    }
    this.notify({ type: 'cancelled' })
  }
}

export interface FakePlatformOptions {
  capabilities?: PlatformCapabilities
  /** When false the test confirms cancellation itself. */
  confirmCancel?: boolean
}

export class FakePlatform implements ListenerPlatform {
  public readonly capabilities: PlatformCapabilities
  public readonly listeners: FakeListener[] = []
  /** Thrown from the next `createListener`. */
  public failWith: Error | undefined
  private readonly confirmCancel: boolean

  constructor(options: FakePlatformOptions = {}) {
    this.capabilities = options.capabilities ?? { listenerIntrospection: true }
    this.confirmCancel = options.confirmCancel ?? true
  }

  get last(): FakeListener {
    const listener = this.listeners[this.listeners.length - 1]
    if (listener === undefined) throw new Error('no listener created')
    return listener
  }

  createListener(parameters: ListenerParameters): PlatformListener {
    const error = this.failWith
    if (error !== undefined) {
      this.failWith = undefined
      throw error
    }
    const listener = new FakeListener(parameters, this.confirmCancel)
    this.listeners.push(listener)
    return listener
  }
}
