import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm'

export enum OrderStatus {
  PENDING = 'PENDING',
}

/**
 * Order record owned by the order service
 *
 * userId is a plain reference to a user held by the user service;
 * there is no foreign key across the two stores.
 */
@Entity({ name: 'orders' })
export class Order {
  @PrimaryGeneratedColumn()
  id!: number

  @Index()
  @Column({ name: 'user_id', type: 'integer' })
  userId!: number

  @Column({ name: 'product_name', type: 'varchar', length: 255 })
  productName!: string

  @Column({ type: 'integer' })
  quantity!: number

  @Column({ name: 'total_price', type: 'real' })
  totalPrice!: number

  @Column({ type: 'varchar', length: 20 })
  status!: OrderStatus

  @Column({ name: 'order_date', type: 'datetime' })
  orderDate!: Date
}

export type NewOrder = Omit<Order, 'id'>

export type OrderInput = {
  userId: number
  productName: string
  quantity: number
  totalPrice: number
  orderDate?: Date
}

/**
 * Build the record for a newly accepted order
 *
 * Every order starts PENDING; orderDate falls back to `now`.
 */
export const buildPendingOrder = (input: OrderInput, now: Date): NewOrder => ({
  userId: input.userId,
  productName: input.productName,
  quantity: input.quantity,
  totalPrice: input.totalPrice,
  status: OrderStatus.PENDING,
  orderDate: input.orderDate ?? now,
})
