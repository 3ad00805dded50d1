export * from './users.controller'
