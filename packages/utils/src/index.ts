export * from './errors'
export * from './socket-address'
export * from './task-queue'
