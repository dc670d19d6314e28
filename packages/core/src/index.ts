export * from './types'
export * from './errors'
export * from './config'
export * from './group'
export * from './scheduler'
export * from './recorder'
export * from './writer/format'
export * from './writer/rotating'
