// Core lookahead modules
export * from './types'
export * from './range'
export * from './deque'
export * from './source'
export * from './views'
export * from './lookahead'
