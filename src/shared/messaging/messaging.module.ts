import { DynamicModule, Global, Module } from '@nestjs/common'

import { MessageProducerService } from './message-producer.service'
import { RedisService } from './redis.service'

/**
 * Messaging Module
 *
 * Provides Redis Streams publishing for domain events.
 * Global so any feature module can publish; inert unless ENABLE_MESSAGING=true.
 *
 * Services provided:
 * - RedisService: Low-level Redis client access
 * - MessageProducerService: Publish messages to streams
 */
@Global()
@Module({})
export class MessagingModule {
  static forRoot(): DynamicModule {
    return {
      module: MessagingModule,
      providers: [RedisService, MessageProducerService],
      exports: [RedisService, MessageProducerService],
    }
  }
}
