// Listening channels over a callback-driven platform listener
// Event loops, futures, lifecycle state, options and the listener bootstrap

export * from './address-cache'
export * from './bootstrap'
export * from './channel'
export * from './config'
export * from './connection-channel'
export * from './errors'
export * from './event-loop'
export * from './event-loop-group'
export * from './future'
export * from './listener/datagram-listener-channel'
export * from './listener/state-managed-listener-channel'
export * from './listener/stream-listener-channel'
export * from './options'
export * from './pipeline'
export * from './state'
export * from './state-managed-channel'
