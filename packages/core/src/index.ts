export * from './types.js'
export * from './errors.js'
export * from './logger.js'
export * from './time.js'
export * from './ip.js'
export * from './scope.js'
export * from './delta.js'
export * from './severity.js'
export * from './events.js'
export * from './run.js'
export * from './store/types.js'
export * from './store/memory.js'
export * from './intel/seed.js'
export * from './managers/base.js'
export * from './managers/vulnerability.js'
export * from './managers/port.js'
export * from './managers/host.js'
