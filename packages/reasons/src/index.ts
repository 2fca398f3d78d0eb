export * from './reason'
export * from './errors'
