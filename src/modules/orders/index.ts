export * from './entities'
export * from './orders.module'
export * from './user-lookup'
