import { Module } from '@nestjs/common'
import { TerminusModule } from '@nestjs/terminus'

import { HealthController } from './health.controller'
import { RedisHealthIndicator } from './redis.health'

/**
 * Health Module
 *
 * Health check endpoints built on @nestjs/terminus.
 * Relies on the global TypeORM data source and MessagingModule.
 */
@Module({
  imports: [TerminusModule],
  controllers: [HealthController],
  providers: [RedisHealthIndicator],
})
export class HealthModule {}
