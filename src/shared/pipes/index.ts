export * from './global-validation.pipe'
export * from './parse-id.pipe'
