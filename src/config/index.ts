export * from './environment'
export * from './validation'
