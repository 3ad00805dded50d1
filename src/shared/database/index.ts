export * from './database.module'
export * from './unique-violation'
