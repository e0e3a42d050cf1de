export * from './device.js'
export * from './errors.js'
export * from './commands.js'
export * from './messages.js'
