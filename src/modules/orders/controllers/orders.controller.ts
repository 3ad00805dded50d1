import { Body, Controller, Get, Param, Post } from '@nestjs/common'

import { ParseIdPipe } from '../../../shared/pipes'
import { CreateOrderDto } from '../dto'
import { Order } from '../entities'
import { OrdersService } from '../services'

/**
 * Orders Controller
 *
 * Endpoints:
 * - POST /orders:              Create a new order (validates the user first)
 * - GET  /orders:              Get all orders
 * - GET  /orders/:id:          Get a specific order
 * - GET  /orders/user/:userId: Get the orders of one user
 */
@Controller('orders')
export class OrdersController {
  constructor(private readonly ordersService: OrdersService) {}

  /**
   * Create a new order
   *
   * Example request:
   * POST /api/orders
   * {
   *   "userId": 1,
   *   "productName": "Laptop",
   *   "quantity": 1,
   *   "totalPrice": 1299.99
   * }
   *
   * Responds 400 when the user does not exist and 503 when the
   * user service cannot be reached.
   */
  @Post()
  async create(@Body() createOrderDto: CreateOrderDto): Promise<Order> {
    return await this.ordersService.create(createOrderDto)
  }

  @Get()
  async findAll(): Promise<Order[]> {
    return await this.ordersService.findAll()
  }

  /**
   * Get the orders of one user
   *
   * Example:
   * GET /api/orders/user/1
   */
  @Get('user/:userId')
  async findByUser(@Param('userId', ParseIdPipe) userId: number): Promise<Order[]> {
    return await this.ordersService.findByUserId(userId)
  }

  /**
   * Get a specific order by ID
   *
   * @throws NotFoundException if order not found
   */
  @Get(':id')
  async findOne(@Param('id', ParseIdPipe) id: number): Promise<Order> {
    return await this.ordersService.findOne(id)
  }
}
