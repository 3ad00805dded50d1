export * from './user.entity'
