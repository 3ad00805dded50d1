export * from './order.entity'
