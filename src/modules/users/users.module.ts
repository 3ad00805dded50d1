import { Module } from '@nestjs/common'
import { TypeOrmModule } from '@nestjs/typeorm'

import { UsersController } from './controllers'
import { User } from './entities'
import { UsersService } from './services'

/**
 * Users Module
 *
 * Feature module of the user service.
 *
 * Dependencies:
 * - DatabaseModule: the service's own data source (imported by the root module)
 * - MessagingModule: Redis Streams publishing (global)
 */
@Module({
  imports: [TypeOrmModule.forFeature([User])],
  controllers: [UsersController],
  providers: [UsersService],
  exports: [UsersService],
})
export class UsersModule {}
