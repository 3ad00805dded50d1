export * from './users.service'
