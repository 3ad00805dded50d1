import {
  BadRequestException,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common'
import { Test, TestingModule } from '@nestjs/testing'
import { getRepositoryToken } from '@nestjs/typeorm'

import { MessageProducerService } from '../../../shared/messaging'
import { Order, OrderStatus } from '../entities'
import { USER_LOOKUP, UserLookupResult } from '../user-lookup'
import { OrdersService } from './orders.service'

/**
 * In-memory stand-in for the TypeORM repository, enough for the
 * calls OrdersService makes.
 */
const createOrderRepository = () => {
  const rows: Order[] = []

  return {
    rows,
    create: jest.fn((data: Omit<Order, 'id'>) => ({ ...data })),
    save: jest.fn(async (data: Omit<Order, 'id'>) => {
      const order: Order = { id: rows.length + 1, ...data }
      rows.push(order)
      return order
    }),
    find: jest.fn(async (options?: { where?: { userId?: number } }) =>
      rows.filter((row) => options?.where?.userId === undefined || row.userId === options.where.userId)
    ),
    findOneBy: jest.fn(async ({ id }: { id: number }) => rows.find((row) => row.id === id) ?? null),
  }
}

describe('OrdersService', () => {
  let service: OrdersService
  let repository: ReturnType<typeof createOrderRepository>
  let userLookup: { getUser: jest.Mock<Promise<UserLookupResult>, [number]> }
  let producer: { publish: jest.Mock }

  const found: UserLookupResult = {
    kind: 'found',
    user: { id: 1, firstName: 'John', lastName: 'Doe', email: 'john@example.com' },
  }

  beforeEach(async () => {
    repository = createOrderRepository()
    userLookup = { getUser: jest.fn() }
    producer = { publish: jest.fn().mockResolvedValue(null) }

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        OrdersService,
        { provide: getRepositoryToken(Order), useValue: repository },
        { provide: USER_LOOKUP, useValue: userLookup },
        { provide: MessageProducerService, useValue: producer },
      ],
    }).compile()

    service = module.get<OrdersService>(OrdersService)
  })

  describe('create', () => {
    it('should store a PENDING order when the user exists', async () => {
      userLookup.getUser.mockResolvedValue(found)

      const order = await service.create({
        userId: 1,
        productName: 'Laptop',
        quantity: 1,
        totalPrice: 1299.99,
      })

      expect(userLookup.getUser).toHaveBeenCalledWith(1)
      expect(order).toEqual({
        id: 1,
        userId: 1,
        productName: 'Laptop',
        quantity: 1,
        totalPrice: 1299.99,
        status: OrderStatus.PENDING,
        orderDate: expect.any(Date),
      })
    })

    it('should default the order date to the creation time', async () => {
      userLookup.getUser.mockResolvedValue(found)
      const before = Date.now()

      const order = await service.create({
        userId: 1,
        productName: 'Keyboard',
        quantity: 2,
        totalPrice: 90,
      })

      expect(order.orderDate.getTime()).toBeGreaterThanOrEqual(before)
      expect(order.orderDate.getTime()).toBeLessThanOrEqual(Date.now())
    })

    it('should keep an order date supplied by the caller', async () => {
      userLookup.getUser.mockResolvedValue(found)
      const orderDate = new Date('2024-03-01T10:00:00.000Z')

      const order = await service.create({
        userId: 1,
        productName: 'Mouse',
        quantity: 1,
        totalPrice: 25,
        orderDate,
      })

      expect(order.orderDate).toEqual(orderDate)
    })

    it('should reject with 400 and store nothing when the user does not exist', async () => {
      userLookup.getUser.mockResolvedValue({ kind: 'not_found' })

      await expect(
        service.create({ userId: 999, productName: 'Monitor', quantity: 1, totalPrice: 299.99 })
      ).rejects.toThrow(new BadRequestException('User with ID 999 does not exist'))

      expect(repository.save).not.toHaveBeenCalled()
      await expect(service.findAll()).resolves.toHaveLength(0)
    })

    it('should reject with 503 and store nothing when the user service is unavailable', async () => {
      userLookup.getUser.mockResolvedValue({ kind: 'unavailable', reason: 'ECONNREFUSED' })

      await expect(
        service.create({ userId: 1, productName: 'Monitor', quantity: 1, totalPrice: 299.99 })
      ).rejects.toThrow(
        new ServiceUnavailableException('Unable to validate user 1: user service unavailable')
      )

      expect(repository.save).not.toHaveBeenCalled()
      expect(producer.publish).not.toHaveBeenCalled()
    })

    it('should publish an orders:created event', async () => {
      userLookup.getUser.mockResolvedValue(found)

      await service.create({ userId: 1, productName: 'Laptop', quantity: 1, totalPrice: 1299.99 })

      expect(producer.publish).toHaveBeenCalledWith(
        'orders:created',
        expect.objectContaining({ orderId: 1, userId: 1, status: OrderStatus.PENDING })
      )
    })

    it('should still return the order when publishing fails', async () => {
      userLookup.getUser.mockResolvedValue(found)
      producer.publish.mockRejectedValue(new Error('Redis down'))

      const order = await service.create({
        userId: 1,
        productName: 'Laptop',
        quantity: 1,
        totalPrice: 1299.99,
      })

      expect(order.id).toBe(1)
    })

    it('should validate each concurrent order independently', async () => {
      userLookup.getUser.mockResolvedValue(found)

      await Promise.all([
        service.create({ userId: 1, productName: 'A', quantity: 1, totalPrice: 1 }),
        service.create({ userId: 1, productName: 'B', quantity: 1, totalPrice: 2 }),
      ])

      expect(userLookup.getUser).toHaveBeenCalledTimes(2)
      await expect(service.findAll()).resolves.toHaveLength(2)
    })
  })

  describe('reads', () => {
    beforeEach(async () => {
      userLookup.getUser.mockImplementation(async (id: number) => ({
        kind: 'found',
        user: { id, firstName: 'Test', lastName: 'User', email: `user${id}@example.com` },
      }))

      await service.create({ userId: 1, productName: 'Laptop', quantity: 1, totalPrice: 1299.99 })
      await service.create({ userId: 2, productName: 'Desk', quantity: 1, totalPrice: 350 })
      await service.create({ userId: 1, productName: 'Chair', quantity: 2, totalPrice: 240 })
    })

    it('should return exactly the orders of one user', async () => {
      const orders = await service.findByUserId(1)

      expect(orders.map((order) => order.productName)).toEqual(['Laptop', 'Chair'])
    })

    it('should return an empty list for a user without orders', async () => {
      await expect(service.findByUserId(3)).resolves.toEqual([])
    })

    it('should find an order by id', async () => {
      await expect(service.findOne(2)).resolves.toMatchObject({ id: 2, productName: 'Desk' })
    })

    it('should throw NotFoundException for an unknown order', async () => {
      await expect(service.findOne(42)).rejects.toThrow(
        new NotFoundException('Order with ID 42 not found')
      )
    })
  })
})
