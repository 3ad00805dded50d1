export * from './entities'
export * from './users.module'
