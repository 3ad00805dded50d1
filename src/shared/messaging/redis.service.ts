import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import Redis from 'ioredis'

import { RedisConfig } from '../../config'

/**
 * Redis Service
 *
 * Manages the Redis connection used for publishing domain events.
 * The client is created lazily and only connects when messaging is enabled,
 * so a service running without Redis never opens a socket.
 *
 * Features:
 * - Automatic reconnection with exponential backoff
 * - Connection health monitoring
 * - Graceful shutdown
 */
@Injectable()
export class RedisService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name)
  private readonly client: Redis
  readonly enabled: boolean

  constructor(private readonly configService: ConfigService) {
    this.enabled = this.configService.get<boolean>('config.features.enableMessaging') ?? false
    const redisConfig = this.configService.get<RedisConfig>('config.redis')

    this.client = new Redis({
      host: redisConfig?.host,
      port: redisConfig?.port,
      password: redisConfig?.password,
      keyPrefix: redisConfig?.keyPrefix,
      maxRetriesPerRequest: redisConfig?.maxRetriesPerRequest,
      enableReadyCheck: redisConfig?.enableReadyCheck,
      enableOfflineQueue: redisConfig?.enableOfflineQueue,
      lazyConnect: true,

      // Retry strategy with exponential backoff
      // Retries: 100ms, 400ms, 900ms, 1600ms, 2500ms, ... capped at 10s
      retryStrategy: (times: number) => {
        const delay = Math.min(times * times * 100, 10_000)
        this.logger.warn(`Retrying Redis connection in ${delay}ms (attempt ${times})`)
        return delay
      },
    })

    this.client.on('ready', () => {
      this.logger.log('Redis client connected and ready')
    })

    this.client.on('error', (error: Error) => {
      this.logger.error(`Redis client error: ${error.message}`)
    })

    this.client.on('end', () => {
      this.logger.warn('Redis client connection ended')
    })
  }

  async onModuleInit(): Promise<void> {
    if (!this.enabled) {
      this.logger.log('Messaging disabled, Redis connection not opened')
      return
    }

    await this.client.connect()
  }

  /**
   * Get the Redis client instance
   */
  getClient(): Redis {
    return this.client
  }

  /**
   * Check if Redis is connected
   *
   * The "ready" status means the client is connected and ready to receive commands.
   */
  isHealthy(): boolean {
    return this.client.status === 'ready'
  }

  /**
   * Ping Redis to check connectivity
   */
  async ping(): Promise<boolean> {
    try {
      const response = await this.client.ping()
      return response === 'PONG'
    } catch (error) {
      this.logger.error('Failed to ping Redis:', error)
      return false
    }
  }

  /**
   * Gracefully close the Redis connection
   */
  async onModuleDestroy(): Promise<void> {
    if (this.client.status === 'ready') {
      await this.client.quit()
      this.logger.log('Redis connection closed')
      return
    }

    this.client.disconnect()
  }
}
