export * from './create-user.dto'
export * from './user-created.event'
