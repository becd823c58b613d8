export * from './types.js'
export * from './cursor-store.js'
export * from './dedup-window.js'
export * from './log-fetcher.js'
export * from './listener.js'
export * from './handlers.js'
export * from './supervisor.js'
export * from './cursor-backend.js'
