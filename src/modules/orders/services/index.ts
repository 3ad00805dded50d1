export * from './orders.service'
