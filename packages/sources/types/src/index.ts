export * from './types'
export * from './latch'
