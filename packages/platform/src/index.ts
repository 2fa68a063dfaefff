// Platform listening primitive
// Callback-driven listeners and connections, plus their Node.js implementation

export * from './connection'
export * from './dispatch-queue'
export * from './endpoint'
export * from './errors'
export * from './listener'
export * from './parameters'
export * from './protocol-options'

export * from './node'
