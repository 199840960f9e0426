export * from './core'
export * from './combinators'
