export * from './http-user-lookup'
export * from './user-lookup'
