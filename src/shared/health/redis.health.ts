import { Injectable } from '@nestjs/common'
import { HealthIndicatorResult } from '@nestjs/terminus'

import { RedisService } from '../messaging/redis.service'

/**
 * Redis Health Indicator
 *
 * Checks the Redis connection used for event publishing.
 * Reports up (marked disabled) when messaging is switched off, since the
 * service then has no dependency on Redis.
 */
@Injectable()
export class RedisHealthIndicator {
  constructor(private readonly redisService: RedisService) {}

  private getStatus(
    key: string,
    isHealthy: boolean,
    data?: Record<string, unknown>
  ): HealthIndicatorResult {
    return {
      [key]: {
        status: isHealthy ? 'up' : 'down',
        ...data,
      },
    }
  }

  /**
   * Check Redis connectivity
   *
   * @param key - Health check key name
   * @throws Error if messaging is enabled and Redis is unreachable
   */
  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    if (!this.redisService.enabled) {
      return this.getStatus(key, true, { disabled: true })
    }

    if (!this.redisService.isHealthy()) {
      throw new Error('Redis client is not in ready state')
    }

    const canPing = await this.redisService.ping()

    if (!canPing) {
      throw new Error('Failed to ping Redis')
    }

    return this.getStatus(key, true, {
      message: 'Redis is healthy',
    })
  }
}
