import { Module } from '@nestjs/common'
import { ConfigModule } from '@nestjs/config'

import { AppController } from '../../app.controller'
import { environmentConfig, validate } from '../../config'
import { User, UsersModule } from '../../modules/users'
import { DatabaseModule } from '../../shared/database'
import { HealthModule } from '../../shared/health'
import { LoggerModule } from '../../shared/logger'
import { MessagingModule } from '../../shared/messaging'
import { MetricsModule } from '../../shared/metrics'

/**
 * User Service Module
 *
 * Root module of the user service. Owns the users store.
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [environmentConfig({ name: 'user-service', port: 8081 })],
      validate,
    }),
    LoggerModule.forRoot(),
    DatabaseModule.forRoot([User]),
    MessagingModule.forRoot(),
    HealthModule,
    MetricsModule,
    UsersModule,
  ],
  controllers: [AppController],
})
export class UserServiceModule {}
