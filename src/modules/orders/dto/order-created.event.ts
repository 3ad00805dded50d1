import { Order } from '../entities'

/**
 * Order Created Event
 *
 * Published to the orders:created stream once an order is stored.
 * Other services can subscribe to react to new orders
 * (reserve stock, send a confirmation, track metrics).
 */
export class OrderCreatedEvent {
  orderId: number
  userId: number
  productName: string
  quantity: number
  totalPrice: number
  status: string
  orderDate: Date

  constructor(order: Order) {
    this.orderId = order.id
    this.userId = order.userId
    this.productName = order.productName
    this.quantity = order.quantity
    this.totalPrice = order.totalPrice
    this.status = order.status
    this.orderDate = order.orderDate
  }
}
