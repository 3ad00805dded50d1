export * from './message-producer.service'
export * from './messaging.module'
export * from './redis.service'
