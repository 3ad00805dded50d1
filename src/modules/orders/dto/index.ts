export * from './create-order.dto'
export * from './order-created.event'
