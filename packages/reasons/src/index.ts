export * from './errors'
export * from './factory'
export * from './registry'
