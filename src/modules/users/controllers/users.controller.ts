import { Body, Controller, Get, Param, Post } from '@nestjs/common'

import { ParseIdPipe } from '../../../shared/pipes'
import { CreateUserDto } from '../dto'
import { User } from '../entities'
import { UsersService } from '../services'

/**
 * Users Controller
 *
 * Endpoints:
 * - POST /users      - Create a new user
 * - GET  /users      - Get all users
 * - GET  /users/:id  - Get a specific user
 *
 * GET /users/:id is also the contract the order service validates against.
 */
@Controller('users')
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  /**
   * Create a new user
   *
   * Example request:
   * POST /api/users
   * {
   *   "firstName": "John",
   *   "lastName": "Doe",
   *   "email": "john@example.com"
   * }
   */
  @Post()
  async create(@Body() createUserDto: CreateUserDto): Promise<User> {
    return this.usersService.create(createUserDto)
  }

  @Get()
  async findAll(): Promise<User[]> {
    return this.usersService.findAll()
  }

  /**
   * Get a specific user by ID
   *
   * @throws NotFoundException if user not found
   */
  @Get(':id')
  async findOne(@Param('id', ParseIdPipe) id: number): Promise<User> {
    return this.usersService.findOne(id)
  }
}
