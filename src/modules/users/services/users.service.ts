import { ConflictException, Injectable, Logger, NotFoundException } from '@nestjs/common'
import { InjectRepository } from '@nestjs/typeorm'
import { Repository } from 'typeorm'

import { isUniqueViolation } from '../../../shared/database'
import { MessageProducerService } from '../../../shared/messaging'
import { CreateUserDto, UserCreatedEvent } from '../dto'
import { User } from '../entities'

/**
 * Users Service
 *
 * Owns user records for the user service.
 * Users are created once and never updated or deleted.
 *
 * Events published:
 * - users:created - When a new user is stored
 */
@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name)

  constructor(
    @InjectRepository(User) private readonly usersRepository: Repository<User>,
    private readonly messageProducer: MessageProducerService
  ) {}

  /**
   * Find all users
   *
   * @returns Every stored user, in id order
   */
  async findAll(): Promise<User[]> {
    return this.usersRepository.find({ order: { id: 'ASC' } })
  }

  /**
   * Find a single user by ID
   *
   * @throws NotFoundException if user not found
   */
  async findOne(id: number): Promise<User> {
    this.logger.debug(`Finding user with ID: ${id}`)

    const user = await this.usersRepository.findOneBy({ id })

    if (!user) {
      throw new NotFoundException(`User with ID ${id} not found`)
    }

    return user
  }

  /**
   * Create a new user
   *
   * Field presence is checked by DTO validation before this runs.
   *
   * @throws ConflictException if the email is already registered
   */
  async create(createUserDto: CreateUserDto): Promise<User> {
    this.logger.log(`Creating user: ${createUserDto.email}`)

    const entity = this.usersRepository.create({
      firstName: createUserDto.firstName,
      lastName: createUserDto.lastName,
      email: createUserDto.email,
    })

    let user: User
    try {
      user = await this.usersRepository.save(entity)
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictException(`User with email ${createUserDto.email} already exists`)
      }
      throw error
    }

    await this.publishCreated(new UserCreatedEvent(user.id, user.email, new Date()))

    this.logger.log(`Created user with ID: ${user.id}`)
    return user
  }

  private async publishCreated(event: UserCreatedEvent): Promise<void> {
    try {
      await this.messageProducer.publish('users:created', event)
    } catch (error) {
      // Log but don't throw - the user is already stored
      this.logger.error('Failed to publish users:created event:', error)
    }
  }
}
