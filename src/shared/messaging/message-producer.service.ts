import { Injectable, Logger } from '@nestjs/common'

import { RedisService } from './redis.service'

export type PublishOptions = {
  /**
   * Maximum stream length (approximate trimming, defaults to 10000)
   */
  maxLength?: number
}

/**
 * Message Producer Service
 *
 * Publishes domain events to Redis Streams so other services can react to
 * them. When messaging is disabled publishing is a no-op that returns null.
 *
 * Usage:
 * ```typescript
 * await this.producer.publish('orders:created', {
 *   orderId: 1,
 *   userId: 1,
 *   totalPrice: 1299.99
 * })
 * ```
 */
@Injectable()
export class MessageProducerService {
  private readonly logger = new Logger(MessageProducerService.name)

  constructor(private readonly redisService: RedisService) {}

  /**
   * Publish a message to a Redis Stream
   *
   * @param stream - Stream name (e.g., 'orders:created', 'users:created')
   * @param data - Message payload (will be JSON serialized)
   * @returns Message ID, or null when messaging is disabled
   */
  async publish<T = unknown>(
    stream: string,
    data: T,
    options: PublishOptions = {}
  ): Promise<string | null> {
    if (!this.redisService.enabled) {
      this.logger.debug(`Messaging disabled, dropping ${stream} message`)
      return null
    }

    const client = this.redisService.getClient()

    try {
      // XADD with MAXLEN ~ keeps the stream bounded; * auto-generates the ID
      const messageId = await client.xadd(
        stream,
        'MAXLEN',
        '~',
        options.maxLength ?? 10_000,
        '*',
        'data',
        JSON.stringify(data),
        'timestamp',
        Date.now().toString()
      )

      this.logger.debug(`Published message to ${stream}: ${messageId}`)
      return messageId
    } catch (error) {
      this.logger.error(`Failed to publish message to ${stream}:`, error)
      throw error
    }
  }
}
