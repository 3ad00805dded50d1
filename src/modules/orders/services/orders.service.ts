import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common'
import { InjectRepository } from '@nestjs/typeorm'
import { Repository } from 'typeorm'

import { MessageProducerService } from '../../../shared/messaging'
import { CreateOrderDto, OrderCreatedEvent } from '../dto'
import { buildPendingOrder, Order } from '../entities'
import { USER_LOOKUP, UserLookup } from '../user-lookup'

/**
 * Orders Service
 *
 * Handles business logic for orders.
 * Order creation is gated by a synchronous lookup of the user
 * in the user service:
 * - user exists        -> order stored as PENDING
 * - user not found     -> 400, nothing stored
 * - lookup unavailable -> 503, nothing stored
 *
 * Known consistency gap: there is no compensation if the write fails after
 * the user was confirmed, and nothing tracks the user after that point.
 */
@Injectable()
export class OrdersService {
  private readonly logger = new Logger(OrdersService.name)

  constructor(
    @InjectRepository(Order) private readonly ordersRepository: Repository<Order>,
    @Inject(USER_LOOKUP) private readonly userLookup: UserLookup,
    private readonly messageProducer: MessageProducerService
  ) {}

  /**
   * Create a new order
   *
   * 1. Validates the order data (handled by DTO validation)
   * 2. Confirms the user exists through the user service
   * 3. Stores the order as PENDING
   * 4. Publishes OrderCreatedEvent to Redis Stream
   *
   * @throws BadRequestException if the user does not exist
   * @throws ServiceUnavailableException if the user service cannot answer
   */
  async create(createOrderDto: CreateOrderDto): Promise<Order> {
    const { userId } = createOrderDto
    this.logger.log(`Creating order for user ${userId}`)

    const lookup = await this.userLookup.getUser(userId)

    switch (lookup.kind) {
      case 'not_found': {
        this.logger.warn(`Rejected order: user ${userId} does not exist`)
        throw new BadRequestException(`User with ID ${userId} does not exist`)
      }
      case 'unavailable': {
        this.logger.warn(`Rejected order: could not validate user ${userId} (${lookup.reason})`)
        throw new ServiceUnavailableException(
          `Unable to validate user ${userId}: user service unavailable`
        )
      }
      case 'found': {
        break
      }
    }

    const order = await this.ordersRepository.save(
      this.ordersRepository.create(buildPendingOrder(createOrderDto, new Date()))
    )

    await this.publishCreated(new OrderCreatedEvent(order))

    this.logger.log(`Created order with ID: ${order.id}`)
    return order
  }

  /**
   * Find order by ID
   *
   * @throws NotFoundException if order not found
   */
  async findOne(id: number): Promise<Order> {
    const order = await this.ordersRepository.findOneBy({ id })

    if (!order) {
      throw new NotFoundException(`Order with ID ${id} not found`)
    }

    return order
  }

  async findAll(): Promise<Order[]> {
    return this.ordersRepository.find({ order: { id: 'ASC' } })
  }

  /**
   * Find orders by user ID
   *
   * Reads local data only; the user service is not consulted.
   */
  async findByUserId(userId: number): Promise<Order[]> {
    return this.ordersRepository.find({ where: { userId }, order: { id: 'ASC' } })
  }

  private async publishCreated(event: OrderCreatedEvent): Promise<void> {
    try {
      await this.messageProducer.publish('orders:created', event)
      this.logger.debug(`Published OrderCreatedEvent for order ${event.orderId}`)
    } catch (error) {
      this.logger.error('Failed to publish OrderCreatedEvent:', error)
    }
  }
}
