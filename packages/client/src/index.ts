export * from './WSClient.js'
export * from './ClientSession.js'
